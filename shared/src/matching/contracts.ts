export type SupportLevel = 'HIGH' | 'LOW'

export type MatchSource = 'cache' | 'ai' | 'fallback'

export type TutorSummaryDto = {
  id: string
  name: string
  price: number
  subjects: string[]
}

export type MatchDetailsDto = {
  compatibilityScore: number
  cognitiveMatchCount: number
  subjectOverlapRatio: number
  reasoning: string
  subjectExplanation: string
}

export type MatchDto = {
  tutor: TutorSummaryDto
  matchDetails: MatchDetailsDto
}

export type MatchTutorsResponse = {
  success: true
  matches: MatchDto[]
  processingTimeMs: number
  cacheHit: boolean
  source: MatchSource
}

export type MatchingErrorCode =
  | 'ASSESSMENT_REQUIRED'
  | 'NO_QUALIFIED_TUTORS'
  | 'LEARNER_NOT_FOUND'
  | 'RATE_LIMITED'
  | 'MATCHING_FAILED'

export type MatchingErrorBody = {
  error: MatchingErrorCode
  message: string
  retryAfter?: number
}

export type MatchStatusResponse = {
  aiEnabled: boolean
  provider: string | null
  model: string | null
  remainingRequests: number
  windowSeconds: number
}
