import { Injectable } from '@nestjs/common';
import { InventoryItem } from '@inventory/dtos';
import { InventoryOutPort } from '@inventory/out-ports';

const SEED_ITEMS: InventoryItem[] = [
  { sku: 'WIDGET-1', name: 'Widget', quantity: 42 },
  { sku: 'GADGET-7', name: 'Gadget', quantity: 3 },
  { sku: 'SPROCKET-2', name: 'Sprocket', quantity: 0 },
];

/**
 * InventoryInMemoryAdapter - process-local stock table for the demo app.
 */
@Injectable()
export class InventoryInMemoryAdapter extends InventoryOutPort {
  private readonly items = new Map<string, InventoryItem>(
    SEED_ITEMS.map((item) => [item.sku, { ...item }]),
  );

  async findItem(sku: string): Promise<InventoryItem | undefined> {
    const item = this.items.get(sku);
    return item ? { ...item } : undefined;
  }
}
