import { Controller, Get, NotFoundException, Param } from '@nestjs/common';
import { FieldMap } from '@metrics/domain';
import { MetricsFields, TimedEvent } from '@metrics/presentation';
import { StockLevel } from '@inventory/dtos';
import { InventoryServicePort } from '@inventory/in-ports';

@Controller('inventory')
export class InventoryController {
  constructor(private readonly inventoryService: InventoryServicePort) {}

  @Get(':sku')
  @TimedEvent('inventory_request')
  async getStock(
    @Param('sku') sku: string,
    @MetricsFields() fields: FieldMap | undefined,
  ): Promise<StockLevel> {
    if (fields) {
      fields.sku = sku;
    }

    const stock = await this.inventoryService.getStock(sku);
    if (!stock) {
      throw new NotFoundException(`Unknown sku: ${sku}`);
    }
    return stock;
  }
}
