// index.ts - Re-exports from all modules

// Types & primitives
export type {
  ID,
  TimestampMs,
  DurationMs,
  CloudProvider,
  TermTypeName,
  CloudRegion,
  InstanceOffer,
  OfferCriteria,
  InstanceType,
  InstancePrice,
  PipelineRunPrice,
  AllowedInstanceAndPriceTypes,
  RunStatus,
  RunStatusChange,
  RunRecord,
  LaunchConfiguration,
  PreferenceLevel,
  PreferenceResource,
} from './types';

export {
  CLOUD_PROVIDERS,
  TermType,
  ALL_TERM_TYPES,
  INSTANCE_PRODUCT_FAMILY,
  STORAGE_PRODUCT_FAMILY,
  GENERAL_PURPOSE_VOLUME_TYPE,
  LINUX_OPERATING_SYSTEM,
  SHARED_TENANCY,
  HOURS_UNIT,
  GB_MONTH_UNIT,
  PriceType,
  FINAL_RUN_STATUSES,
  PREFERENCE_LEVEL_PRIORITY,
  spotTermName,
  termTypeFor,
  isFinalStatus,
} from './types';

// Errors
export type { ErrorCategory } from './errors';
export {
  OfferDeskError,
  ValidationError,
  NotFoundError,
  ConfigurationError,
  ProviderError,
  errorMessage,
} from './errors';

// Timing
export { TIMING, MS_PER_HOUR, HOURS_PER_MONTH, parseDuration, toHours } from './config/timing';
