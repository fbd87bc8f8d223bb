import { setLogLevel } from "../src/logger.js";

// Absorbed failures log at warn/error; keep test output readable.
setLogLevel("silent");
