import { StockLevel } from '@inventory/dtos';

export abstract class InventoryServicePort {
  /** Resolves undefined for an unknown sku. */
  abstract getStock(sku: string): Promise<StockLevel | undefined>;
}
