export const FENCE = /^```/;
export const FENCE_CLOSE = /^```$/;
export const TABLE_ROW = /^\| .*\|\s*$/;
/** Any line not starting with a pipe ends a table. */
export const TABLE_END = /^[^|]/;
export const FRONT_MATTER_KEY = /^-?[a-z_0-9.-]+:/;
export const FRONT_MATTER_LINE = /^ *-?[a-z_0-9.-]+:|^ +-/;
export const FRONT_MATTER_END = /^(#|\*|!|---)|^\s*$/;
export const FOOTNOTE = /^\[\^/;
