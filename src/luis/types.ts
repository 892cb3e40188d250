export interface IntentScore {
  intent: string
  score: number
}

export interface RecognizerResult {
  text: string
  /** Sorted by descending score. */
  intents: IntentScore[]
}

export interface IntentRecognizer {
  recognize(text: string): Promise<RecognizerResult>
}

export const NONE_INTENT = 'None'

export function getTopScoringIntent(result: RecognizerResult): IntentScore {
  let top: IntentScore = { intent: NONE_INTENT, score: 0 }
  for (const candidate of result.intents) {
    if (candidate.score > top.score) {
      top = candidate
    }
  }
  return top
}

export function rankIntents(intents: IntentScore[]): IntentScore[] {
  return [...intents].sort((a, b) => b.score - a.score)
}
