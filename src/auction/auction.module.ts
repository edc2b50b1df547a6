import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { BalancesModule } from '../balances/balances.module';
import { ChatModule } from '../chat/chat.module';
import { AuctionLedgerService } from './auction-ledger.service';
import { AuctionController } from './auction.controller';
import { AuctionGateway } from './auction.gateway';
import { AuctionService } from './auction.service';
import { loadAuctionSettings } from './auction.settings';
import { CommitmentService } from './commitment.service';
import { AuctionEngine } from './engine';
import { ExpirySchedulerService } from './expiry-scheduler.service';
import { ParticipantsController } from './participants.controller';
import { PinnedSummaryService } from './pinned-summary.service';
import { SettlementService } from './settlement.service';

@Module({
  imports: [ChatModule, BalancesModule],
  controllers: [AuctionController, ParticipantsController],
  providers: [
    {
      provide: AuctionEngine,
      useFactory: (config: ConfigService) =>
        new AuctionEngine(loadAuctionSettings(config)),
      inject: [ConfigService],
    },
    AuctionLedgerService,
    CommitmentService,
    PinnedSummaryService,
    AuctionService,
    SettlementService,
    ExpirySchedulerService,
    AuctionGateway,
  ],
  exports: [AuctionService],
})
export class AuctionModule {}
