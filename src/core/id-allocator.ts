import type { DocumentMeta } from '../types/index.js';

/**
 * Hands out integer note ids, reusing released ids oldest-first.
 *
 * State is held in memory only; the owner persists `snapshot()` into the
 * document's `_meta` alongside every mutation.
 */
export class IdAllocator {
  private idCount: number;
  private oldIds: number[];

  constructor(meta: DocumentMeta = { id_count: 0, old_ids: [] }) {
    this.idCount = meta.id_count;
    this.oldIds = [...meta.old_ids];
  }

  allocate(): number {
    const recycled = this.oldIds.shift();
    if (recycled !== undefined) {
      return recycled;
    }
    return this.idCount++;
  }

  release(id: number): void {
    this.oldIds.push(id);
  }

  snapshot(): DocumentMeta {
    return { id_count: this.idCount, old_ids: [...this.oldIds] };
  }

  restore(meta: DocumentMeta): void {
    this.idCount = meta.id_count;
    this.oldIds = [...meta.old_ids];
  }
}
