import { Module } from '@nestjs/common';
import { BALANCE_ORACLE } from './balance-oracle';
import { GoogleSheetsClient } from './google-sheets.client';
import { SheetsBalanceOracle } from './sheets-balance-oracle.service';
import { SPREADSHEET_CLIENT } from './spreadsheet-client';

@Module({
  providers: [
    { provide: SPREADSHEET_CLIENT, useClass: GoogleSheetsClient },
    { provide: BALANCE_ORACLE, useClass: SheetsBalanceOracle },
  ],
  exports: [BALANCE_ORACLE],
})
export class BalancesModule {}
