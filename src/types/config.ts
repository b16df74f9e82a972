/**
 * Similarity cut points for the four match categories.
 *
 * Must satisfy `1 >= exact >= veryClose >= somewhatClose >= 0`.
 */
export interface ThresholdConfig {
  /** Scores at or above this are `EXACT` */
  exact: number
  /** Scores at or above this (and below `exact`) are `VERY_CLOSE` */
  veryClose: number
  /** Scores at or above this (and below `veryClose`) are `SOMEWHAT_CLOSE` */
  somewhatClose: number
}

