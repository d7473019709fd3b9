// PURITY: SHELL
// INVARIANT: Single import point for the Node built-ins the shell touches

import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { fileURLToPath } from "node:url";

// node:path uses `export =`, which `export *` cannot re-export.
export const fs = fsNS;
export const path = pathNS;
