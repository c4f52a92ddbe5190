import { setLogLevel } from "../logging/subsystem.js";

setLogLevel("error");
