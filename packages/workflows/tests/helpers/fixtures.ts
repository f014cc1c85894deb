import { isWithinRange } from '@fxledger/core';
import type {
  ClockPort,
  CommodityObservation,
  CommoditySourcePort,
  DateWindow,
  RateObservation,
  RateSourcePort,
} from '@fxledger/core';
import type { FxLedgerConfig } from '@fxledger/utils';

export const TEST_CONFIG: FxLedgerConfig = {
  sqlitePath: ':memory:',
  sourcePriority: ['SBI', 'RBI'],
  batchSize: 500,
};

export const FIXED_CLOCK: ClockPort = { nowMs: () => Date.UTC(2023, 2, 10, 12) };

function rbi(date: string, currencyCode: string, rate: number): RateObservation {
  return { date, currencyCode, source: 'RBI', rate };
}

export const RBI_ROWS: RateObservation[] = [
  rbi('2023-01-01', 'USD', 82),
  rbi('2023-01-01', 'EUR', 88),
  rbi('2023-01-02', 'USD', 83),
  rbi('2023-01-08', 'USD', 84),
  rbi('2023-01-08', 'EUR', 90),
  rbi('2023-02-05', 'USD', 85),
  rbi('2023-02-05', 'EUR', 92),
];

export const COPPER_ROWS: CommodityObservation[] = [
  { date: '2023-01-03', metal: 'COPPER', spotPrice: 8000, forward3mPrice: 8050, stockQuantity: 90000 },
  { date: '2023-01-04', metal: 'COPPER', spotPrice: 8100, forward3mPrice: null, stockQuantity: null },
];

/** Rate port serving a fixed table, clipped to each requested window */
export class FixedRateSource implements RateSourcePort {
  readonly windows: DateWindow[] = [];

  constructor(
    readonly source: RateSourcePort['source'],
    private readonly rows: readonly RateObservation[]
  ) {}

  async fetchRates(window: DateWindow): Promise<RateObservation[]> {
    this.windows.push(window);
    return this.rows.filter((row) => isWithinRange(row.date, window));
  }
}

export class FixedCommoditySource implements CommoditySourcePort {
  constructor(
    readonly metal: CommoditySourcePort['metal'],
    private readonly rows: readonly CommodityObservation[]
  ) {}

  async fetchPrices(): Promise<CommodityObservation[]> {
    return [...this.rows];
  }
}
