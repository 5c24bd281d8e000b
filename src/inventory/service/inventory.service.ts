import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DEFAULT_LOW_STOCK_THRESHOLD } from '@config';
import { MetricsUseCase } from '@metrics/in-ports';
import { StockLevel } from '@inventory/dtos';
import { InventoryServicePort } from '@inventory/in-ports';
import { InventoryOutPort } from '@inventory/out-ports';

@Injectable()
export class InventoryService extends InventoryServicePort {
  private readonly lowStockThreshold: number;

  constructor(
    private readonly outPort: InventoryOutPort,
    private readonly metrics: MetricsUseCase,
    private readonly configService: ConfigService,
  ) {
    super();
    this.lowStockThreshold = this.configService.get<number>(
      'inventory.lowStockThreshold',
      DEFAULT_LOW_STOCK_THRESHOLD,
    );
  }

  async getStock(sku: string): Promise<StockLevel | undefined> {
    const item = await this.metrics.timer(
      'stock_lookup',
      { sku },
      async (fields) => {
        const found = await this.outPort.findItem(sku);
        fields.found = found !== undefined;
        return found;
      },
    );
    if (!item) return undefined;

    const lowStock = item.quantity < this.lowStockThreshold;
    if (lowStock) {
      this.metrics.recordEvent('low_stock', {
        sku,
        quantity: item.quantity,
        threshold: this.lowStockThreshold,
      });
    }

    return { ...item, lowStock };
  }
}
