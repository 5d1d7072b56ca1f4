export type {
  MatchDetailsDto,
  MatchDto,
  MatchingErrorBody,
  MatchingErrorCode,
  MatchSource,
  MatchStatusResponse,
  MatchTutorsResponse,
  SupportLevel,
  TutorSummaryDto
} from './matching/contracts.js'
