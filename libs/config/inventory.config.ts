import { registerAs } from '@nestjs/config';

export interface InventoryConfig {
  lowStockThreshold: number;
}

export const DEFAULT_LOW_STOCK_THRESHOLD = 5;

export default registerAs(
  'inventory',
  (): InventoryConfig => {
    const threshold = Number(process.env.INVENTORY_LOW_STOCK_THRESHOLD);
    return {
      lowStockThreshold:
        process.env.INVENTORY_LOW_STOCK_THRESHOLD && Number.isInteger(threshold)
          ? threshold
          : DEFAULT_LOW_STOCK_THRESHOLD,
    };
  },
);
