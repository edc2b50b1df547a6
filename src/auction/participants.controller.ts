import {
  Controller,
  Get,
  NotFoundException,
  Param,
  ServiceUnavailableException,
} from '@nestjs/common';
import type { BalanceRecord } from '../balances/balance-oracle';
import { ExternalServiceError } from '../common/errors';
import { AuctionService } from './auction.service';
import type { Availability } from './engine';

@Controller()
export class ParticipantsController {
  constructor(private readonly auctionService: AuctionService) {}

  @Get('participants/:id/availability')
  async availability(
    @Param('id') participantId: string,
  ): Promise<Availability & { participantId: string }> {
    const availability = await this.withBalances(() =>
      this.auctionService.getAvailability(participantId),
    );
    if (!availability) {
      throw new NotFoundException('Participant is not on the balance sheet');
    }
    return { participantId, ...availability };
  }

  @Get('balances')
  async balances(): Promise<BalanceRecord[]> {
    return this.withBalances(() => this.auctionService.listBalances());
  }

  private async withBalances<T>(fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ExternalServiceError) {
        throw new ServiceUnavailableException(err.message);
      }
      throw err;
    }
  }
}
