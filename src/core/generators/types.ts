/**
 * A descriptor file produced by a generator. `path` is relative to the
 * generators folder of the layout.
 */
export interface GeneratedFile {
  path: string;
  content: string;
}
