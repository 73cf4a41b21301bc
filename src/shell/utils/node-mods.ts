/**
 * Shared re-export of the Node file-system API the shell touches, so loader
 * and reporter import it from one place.
 *
 * Invariant: re-exported through a constant, since node:fs uses `export =`.
 */
import * as fsNS from "node:fs";

export const fsPromises = fsNS.promises;
