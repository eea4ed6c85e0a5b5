import * as fs from "fs";
import { logProgress } from "./logger.js";

/**
 * Create the output directory (and missing parents). No-op when it exists.
 */
export function prepareWorkspace(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
  logProgress(`✓ Directory '${dir}' created/verified`);
}
