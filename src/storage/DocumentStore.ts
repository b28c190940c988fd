/** The external document store, reduced to the two calls this core needs. */
export interface DocumentStore {
  get(key: string): Promise<unknown | null>;
  put(key: string, value: unknown): Promise<void>;
}

/** In-process store. Values are deep-cloned on the way in and out, like a real backend would serialize them. */
export class MemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<string, unknown>();

  async get(key: string): Promise<unknown | null> {
    return this.docs.has(key) ? structuredClone(this.docs.get(key)) : null;
  }

  async put(key: string, value: unknown): Promise<void> {
    this.docs.set(key, structuredClone(value));
  }

  keys(): string[] {
    return [...this.docs.keys()];
  }
}
