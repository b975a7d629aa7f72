/**
 * Dry-run overlay - an InventoryStore that reads through to a real store and
 * keeps every write in memory.
 *
 * Later rows of the same import see the staged effects of earlier rows, so a
 * dry run reports the same outcomes a real run would.
 */

import { applyPatch, type InventoryItem, type InventoryPatch, type ItemStatus, type NewInventoryItem } from '../types';
import { titleKey } from './fields';
import type { InventoryStore } from './types';

export class DryRunStore implements InventoryStore {
  private readonly base: InventoryStore;
  /** Items written during the dry run, by id (staged inserts have negative ids) */
  private readonly staged = new Map<number, InventoryItem>();
  /** Base items seen through a finder, so updates can be staged against them */
  private readonly known = new Map<number, InventoryItem>();
  private nextId = -1;

  constructor(base: InventoryStore) {
    this.base = base;
  }

  findBySku(sku: string): InventoryItem[] {
    return this.view(this.base.findBySku(sku), (item) => item.sku === sku);
  }

  findByTitleFuzzy(title: string, excludeStatus: ItemStatus): InventoryItem[] {
    const key = titleKey(title);
    return this.view(
      this.base.findByTitleFuzzy(title, excludeStatus),
      (item) => item.status !== excludeStatus && titleKey(item.title) === key,
    );
  }

  findByExternalItemId(externalItemId: string): InventoryItem[] {
    return this.view(
      this.base.findByExternalItemId(externalItemId),
      (item) => item.externalItemId === externalItemId,
    );
  }

  findSoldByOrderNumber(orderNumber: string): InventoryItem[] {
    return this.view(
      this.base.findSoldByOrderNumber(orderNumber),
      (item) => item.status === 'Sold' && item.orderNumber === orderNumber,
    );
  }

  insert(record: NewInventoryItem): InventoryItem {
    const now = new Date();
    const item: InventoryItem = { ...record, id: this.nextId--, createdAt: now, updatedAt: now };
    this.staged.set(item.id, item);
    return item;
  }

  update(id: number, fields: InventoryPatch): void {
    const current = this.staged.get(id) ?? this.known.get(id);
    if (!current) {
      throw new Error(`Inventory item ${id} not found`);
    }
    this.staged.set(id, applyPatch(current, fields));
  }

  transaction<T>(fn: () => T): T {
    return fn();
  }

  /**
   * Merge base results with the overlay: staged versions replace the base
   * copies, and staged items the base never returned are added when they match.
   */
  private view(baseItems: InventoryItem[], matches: (item: InventoryItem) => boolean): InventoryItem[] {
    const seen = new Set<number>();
    const result: InventoryItem[] = [];

    for (const item of baseItems) {
      this.known.set(item.id, item);
      seen.add(item.id);
      const current = this.staged.get(item.id) ?? item;
      if (matches(current)) result.push(current);
    }

    for (const item of this.staged.values()) {
      if (!seen.has(item.id) && matches(item)) result.push(item);
    }
    return result;
  }
}
