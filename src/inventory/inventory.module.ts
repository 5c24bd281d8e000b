import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { inventoryConfig } from '@config';
import { InventoryController } from '@inventory/presentation';
import { InventoryService } from '@inventory/service';
import { InventoryInMemoryAdapter } from '@inventory/infrastructure';
import { InventoryOutPort } from '@inventory/out-ports';
import { InventoryServicePort } from '@inventory/in-ports';

@Module({
  imports: [ConfigModule.forFeature(inventoryConfig)],
  controllers: [InventoryController],
  providers: [
    { provide: InventoryServicePort, useClass: InventoryService },
    { provide: InventoryOutPort, useClass: InventoryInMemoryAdapter },
  ],
})
export class InventoryModule {}
