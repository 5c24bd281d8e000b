import { InventoryItem } from '@inventory/dtos';

export abstract class InventoryOutPort {
  abstract findItem(sku: string): Promise<InventoryItem | undefined>;
}
