import { documentKey } from './similarity.js';
import type { DocumentRef, DocumentStore, IndexedDocument } from './types.js';

export class MemoryDocumentStore implements DocumentStore {
  private _docs = new Map<string, IndexedDocument>();

  async load(): Promise<IndexedDocument[]> {
    return [...this._docs.values()];
  }

  async put(doc: IndexedDocument): Promise<void> {
    this._docs.set(documentKey(doc), doc);
  }

  async delete(ref: DocumentRef): Promise<void> {
    this._docs.delete(documentKey(ref));
  }

  get size(): number {
    return this._docs.size;
  }
}
