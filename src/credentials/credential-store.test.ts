import { describe, expect, it } from "vitest";
import {
  createEnvCredentialStore,
  createStaticCredentialStore,
  noCredentials,
  redactCredential,
} from "./credential-store.js";

describe("createEnvCredentialStore", () => {
  it("reads the variable on every call", () => {
    const env: NodeJS.ProcessEnv = { KEYRELAY_API_KEY: "test-secret" };
    const store = createEnvCredentialStore(env);
    expect(store.get()).toBe("test-secret");
    env.KEYRELAY_API_KEY = "test-secret-2";
    expect(store.get()).toBe("test-secret-2");
  });

  it("treats blank values as absent", () => {
    expect(createEnvCredentialStore({ KEYRELAY_API_KEY: "   " }).get()).toBeNull();
    expect(createEnvCredentialStore({}).get()).toBeNull();
  });

  it("supports a custom variable name", () => {
    expect(createEnvCredentialStore({ OTHER_KEY: " test-secret " }, "OTHER_KEY").get()).toBe("test-secret");
  });
});

describe("static stores", () => {
  it("return the fixed value", () => {
    expect(createStaticCredentialStore("test-secret").get()).toBe("test-secret");
    expect(createStaticCredentialStore("").get()).toBeNull();
    expect(noCredentials.get()).toBeNull();
  });
});

describe("redactCredential", () => {
  it("never prints a whole key", () => {
    expect(redactCredential(null)).toBe("(none)");
    expect(redactCredential("short")).toBe("****");
    expect(redactCredential("test-secret-value")).toBe("test…ue");
  });
});
