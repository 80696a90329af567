export interface TitleProvider {
  /** A random known title, or undefined when the store is empty. */
  randomTitle(): Promise<string | undefined>;

  /** Sanitized titles containing the query, case-insensitively. */
  suggest(query: string): Promise<readonly string[]>;
}
