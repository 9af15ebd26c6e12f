import type { EntityCollection, PendingOperation, PendingOperationQueue } from '@catalog-sync/core';
import { BehaviorSubject, type Observable } from 'rxjs';

/**
 * In-memory FIFO of pending operations.
 *
 * Order is insertion order; `update` replaces an operation in place.
 */
export class MemoryPendingOperationQueue implements PendingOperationQueue {
  private operations: PendingOperation[] = [];
  private readonly sizeSubject = new BehaviorSubject<number>(0);

  async enqueue(operation: PendingOperation): Promise<void> {
    this.operations.push(structuredClone(operation));
    this.publishSize();
  }

  async peekOldest(): Promise<PendingOperation | null> {
    const oldest = this.operations[0];
    return oldest ? structuredClone(oldest) : null;
  }

  async dequeueOldest(): Promise<PendingOperation | null> {
    const oldest = this.operations.shift();
    if (!oldest) return null;
    this.publishSize();
    return oldest;
  }

  async list(): Promise<PendingOperation[]> {
    return this.operations.map((operation) => structuredClone(operation));
  }

  async findForEntity(collection: EntityCollection, entityId: string): Promise<PendingOperation[]> {
    return this.operations
      .filter((operation) => operation.collection === collection && operation.entityId === entityId)
      .map((operation) => structuredClone(operation));
  }

  async get(id: string): Promise<PendingOperation | null> {
    const operation = this.operations.find((candidate) => candidate.id === id);
    return operation ? structuredClone(operation) : null;
  }

  async update(operation: PendingOperation): Promise<void> {
    const index = this.operations.findIndex((candidate) => candidate.id === operation.id);
    if (index === -1) return;
    this.operations[index] = structuredClone(operation);
  }

  async remove(id: string): Promise<void> {
    const before = this.operations.length;
    this.operations = this.operations.filter((operation) => operation.id !== id);
    if (this.operations.length !== before) {
      this.publishSize();
    }
  }

  async removeForEntity(collection: EntityCollection, entityId: string): Promise<number> {
    const before = this.operations.length;
    this.operations = this.operations.filter(
      (operation) => operation.collection !== collection || operation.entityId !== entityId
    );
    const removed = before - this.operations.length;
    if (removed > 0) {
      this.publishSize();
    }
    return removed;
  }

  async count(): Promise<number> {
    return this.operations.length;
  }

  async clear(): Promise<void> {
    this.operations = [];
    this.publishSize();
  }

  size$(): Observable<number> {
    return this.sizeSubject.asObservable();
  }

  destroy(): void {
    this.sizeSubject.complete();
    this.operations = [];
  }

  private publishSize(): void {
    this.sizeSubject.next(this.operations.length);
  }
}
