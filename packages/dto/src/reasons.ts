import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // INPUT
  INPUT_OUT_OF_RANGE: { code: 'INPUT_OUT_OF_RANGE', category: ReasonCategory.INPUT, message: 'Observed amount exceeds the 64-bit range' },

  // CODEC
  WRONG_LENGTH: { code: 'WRONG_LENGTH', category: ReasonCategory.CODEC, message: 'Canonical buffer must be exactly 96 bytes' },
  DECISION_OUT_OF_RANGE: { code: 'DECISION_OUT_OF_RANGE', category: ReasonCategory.CODEC, message: 'Decision field is not 0 or 1' },

  // RECOVERY
  TOO_SHORT: { code: 'TOO_SHORT', category: ReasonCategory.RECOVERY, message: 'Payload is shorter than one canonical buffer' },
  NO_VALID_TUPLE: { code: 'NO_VALID_TUPLE', category: ReasonCategory.RECOVERY, message: 'No plausible signal tuple found in payload' },

  // MARKET
  FULFILLMENT_TIMEOUT: { code: 'FULFILLMENT_TIMEOUT', category: ReasonCategory.MARKET, message: 'Request expired before fulfillment' },
}
