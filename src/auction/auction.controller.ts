import {
  Controller,
  Get,
  NotFoundException,
  Param,
  Query,
} from '@nestjs/common';
import { AuctionService } from './auction.service';
import type { Auction } from './engine';

type AuctionView = Auction & { secondsLeft: number };

@Controller('auctions')
export class AuctionController {
  constructor(private readonly auctionService: AuctionService) {}

  @Get()
  async list(@Query('channelId') channelId?: string): Promise<AuctionView[]> {
    const auctions = await this.auctionService.listActive(channelId || undefined);
    return auctions.map((auction) => this.toView(auction));
  }

  @Get(':threadId')
  async get(@Param('threadId') threadId: string): Promise<AuctionView> {
    const auction = await this.auctionService.getAuction(threadId);
    if (!auction) throw new NotFoundException('Auction not found');
    return this.toView(auction);
  }

  private toView(auction: Auction): AuctionView {
    return {
      ...auction,
      secondsLeft:
        auction.status === 'active'
          ? this.auctionService.secondsUntilExpiry(auction)
          : 0,
    };
  }
}
