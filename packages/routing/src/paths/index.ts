/**
 * Path enumeration module.
 *
 * Graph + (start, end) -> every simple path, in a stable order
 */

export { enumeratePaths, describePath } from "./path-enumerator.js";
