// Session types
export {
  SessionStatusSchema,
  SessionContextSchema,
  StructuredErrorSchema,
  StageRecordSchema,
  SessionStateSchema,
  type SessionStatus,
  type SessionContext,
  type StructuredError,
  type StageRecord,
  type SessionState,
  type SessionResult,
} from './session.js';

// Trace types
export {
  TraceOutcomeSchema,
  TraceEntrySchema,
  type TraceOutcome,
  type TraceEntry,
  type TraceFilter,
  type TraceDraft,
} from './trace.js';

// Long-term knowledge
export {
  LongTermCategorySchema,
  LongTermEntrySchema,
  type LongTermEntry,
} from './long-term.js';

// Backends
export {
  BackendParamsSchema,
  BackendRequestSchema,
  STUB_BACKEND,
  type BackendParams,
  type BackendRequest,
} from './backend.js';

// Skills catalog
export {
  ProficiencySchema,
  QUALIFIED_LEVELS,
  EmployeeSkillSchema,
  EmployeeSchema,
  ProjectSchema,
  SkillMarketSchema,
  CatalogSchema,
  SkillDefinitionSchema,
  SkillVocabularySchema,
  type Proficiency,
  type Employee,
  type Project,
  type SkillMarket,
  type Catalog,
  type SkillDefinition,
  type SkillVocabulary,
} from './skills.js';

// Stage outputs
export {
  IntentSchema,
  SkillGapSchema,
  GapAnalysisSchema,
  StrategySchema,
  RecommendationSchema,
  type Intent,
  type SkillGap,
  type GapAnalysis,
  type Strategy,
  type Recommendation,
} from './gap-analysis.js';

// Config
export {
  BUILTIN_STAGES,
  BackendConfigSchema,
  LogLevelSchema,
  GapflowConfigSchema,
  type BackendConfig,
  type GapflowConfig,
  type GapflowConfigInput,
} from './config.js';
