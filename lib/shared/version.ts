/**
 * Version constant; kept equal to the "version" field of package.json.
 */
export const VERSION = "0.1.0";
