/**
 * plausibility.ts
 * Range predicates a decoded window must satisfy before recovery accepts it.
 * A strict decode can succeed on envelope words by accident; these rules reject those hits.
 */
import { Decision } from '@trend-signal/dto'
import type { SignalResult } from '@trend-signal/dto'

export interface PlausibilityRule {
  name: string
  test(result: SignalResult): boolean
}

// 0.1 of a native unit in 18-decimal subunits
export const DEFAULT_MIN_FORECAST_VALUE = 10n ** 17n
export const MAX_CONFIDENCE = 100n

export const decisionIsBinary: PlausibilityRule = {
  name: 'decision-binary',
  test: r => r.decision === Decision.SELL || r.decision === Decision.BUY,
}

export const confidenceIsPercent: PlausibilityRule = {
  name: 'confidence-percent',
  test: r => r.confidence >= 0n && r.confidence <= MAX_CONFIDENCE,
}

export function forecastAbove(floor: bigint): PlausibilityRule {
  return {
    name: `forecast-above-${floor}`,
    test: r => r.forecastValue > floor,
  }
}

// applied on every recovery; caller rules are checked after these
export const REQUIRED_RULES: ReadonlyArray<PlausibilityRule> = [decisionIsBinary, confidenceIsPercent]

export function defaultRules(minForecastValue: bigint = DEFAULT_MIN_FORECAST_VALUE): PlausibilityRule[] {
  return [decisionIsBinary, confidenceIsPercent, forecastAbove(minForecastValue)]
}

/**
 * withRequiredRules
 * REQUIRED_RULES followed by the caller's rules, without repeating a required one.
 */
export function withRequiredRules(rules: ReadonlyArray<PlausibilityRule>): PlausibilityRule[] {
  return [...REQUIRED_RULES, ...rules.filter(rule => !REQUIRED_RULES.includes(rule))]
}

/**
 * firstFailedRule
 * Name of the first rule the result breaks, or undefined when all pass.
 */
export function firstFailedRule(result: SignalResult, rules: ReadonlyArray<PlausibilityRule>): string | undefined {
  for (const rule of rules) {
    if (!rule.test(result)) return rule.name
  }
  return undefined
}
