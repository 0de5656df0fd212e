/**
 * Interface for durable JSON document storage keyed by string identifiers.
 * One store holds one namespace; keys are opaque and never address another document.
 */
export interface IDocumentStore {
  /**
   * Returns the parsed document, or undefined when it is missing or unreadable
   */
  load(key: string): Promise<unknown>;

  save(key: string, document: unknown): Promise<void>;

  delete(key: string): Promise<void>;
}
