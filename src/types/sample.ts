/** A corpus sample. `id` is the corpus-relative path with "/" separators. */
export type Sample = {
  id: string;
  path: string;
  content: string;
};
