import type { CounterResult, RankedMatchup } from '@shared/types'
import {
  COUNTER_CUTOFF,
  COUNTERED_CUTOFF,
  MIN_SAMPLE_SIZE,
} from '@shared/constants/thresholds'
import type { ClassificationThresholds, MatchupRecord } from './types'

// @DEV-GUIDE: Pure threshold classifier shared by every provider.
// 1. Drop records whose known sampleSize is below minSampleSize (null sample sizes stay).
// 2. Records tagged with a positional section go straight into that list. Everything else:
//    score >= counteredCutoff -> countered, score <= counterCutoff -> counters, and the
//    band strictly between the two cutoffs is discarded. Both cutoffs are inclusive.
// 3. countered is sorted by score descending, counters ascending. Array#sort is stable,
//    so equal scores keep extraction order.

export const DEFAULT_THRESHOLDS: Readonly<ClassificationThresholds> = Object.freeze({
  counterCutoff: COUNTER_CUTOFF,
  counteredCutoff: COUNTERED_CUTOFF,
  minSampleSize: MIN_SAMPLE_SIZE,
})

export function classifyMatchups(
  records: readonly MatchupRecord[],
  thresholds: Readonly<ClassificationThresholds> = DEFAULT_THRESHOLDS,
): CounterResult {
  const counters: RankedMatchup[] = []
  const countered: RankedMatchup[] = []

  for (const record of records) {
    if (record.sampleSize !== null && record.sampleSize < thresholds.minSampleSize) continue

    const ranked = { opponentId: record.opponentId, score: record.score }
    const bucket = record.section ?? bucketByScore(record.score, thresholds)

    if (bucket === 'countered') {
      countered.push(ranked)
    } else if (bucket === 'counters') {
      counters.push(ranked)
    }
  }

  countered.sort((a, b) => b.score - a.score)
  counters.sort((a, b) => a.score - b.score)

  return { counters, countered }
}

function bucketByScore(
  score: number,
  thresholds: Readonly<ClassificationThresholds>,
): 'counters' | 'countered' | null {
  if (score >= thresholds.counteredCutoff) return 'countered'
  if (score <= thresholds.counterCutoff) return 'counters'
  return null
}
