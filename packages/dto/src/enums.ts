export enum Decision {
  SELL = 0,
  BUY = 1,
}

export enum ReasonCategory {
  INPUT = "INPUT",
  CODEC = "CODEC",
  RECOVERY = "RECOVERY",
  MARKET = "MARKET",
}

export type DecodeErrorCode =
  | "INPUT_OUT_OF_RANGE"
  | "WRONG_LENGTH"
  | "DECISION_OUT_OF_RANGE"
  | "TOO_SHORT"
  | "NO_VALID_TUPLE";

export type MarketErrorCode = "FULFILLMENT_TIMEOUT";

export type ReasonCode = DecodeErrorCode | MarketErrorCode;

export interface ReasonDetail {
  code: ReasonCode;
  category: ReasonCategory;
  message: string;
  context?: Record<string, string | number | boolean>;
}

/**
 * The committed output of one forecaster run.
 * confidence is an integer percentage in [0, 100]; forecastValue is denominated
 * in the same smallest subunit as the observed amount.
 */
export interface SignalResult {
  decision: Decision;
  confidence: bigint;
  forecastValue: bigint;
}

export interface PricePoint {
  readonly timeIndex: bigint;
  readonly price: bigint;
}

export type HistoricalSeries = ReadonlyArray<PricePoint>;

export interface TrendModel {
  slope: bigint;
  intercept: bigint;
  confidence: bigint;
}
