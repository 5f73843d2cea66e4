import type { HistoricalSeries, PricePoint } from '@trend-signal/dto'

// 30 daily closes, native unit (USD per ETH), as (day, price)
const ROWS: ReadonlyArray<readonly [number, number]> = [
  [1, 3200], [2, 3215], [3, 3189], [4, 3221], [5, 3254],
  [6, 3278], [7, 3242], [8, 3291], [9, 3315], [10, 3287],
  [11, 3324], [12, 3352], [13, 3389], [14, 3412], [15, 3398],
  [16, 3436], [17, 3462], [18, 3489], [19, 3453], [20, 3507],
  [21, 3534], [22, 3561], [23, 3528], [24, 3582], [25, 3615],
  [26, 3648], [27, 3621], [28, 3674], [29, 3702], [30, 3735],
]

export const PRICE_HISTORY: HistoricalSeries = Object.freeze(
  ROWS.map(([day, price]): PricePoint => Object.freeze({ timeIndex: BigInt(day), price: BigInt(price) }))
)

// Reference native price the observed amount is assumed to be quoted at
export const ASSUMED_CURRENT_NATIVE_PRICE = 3200n
