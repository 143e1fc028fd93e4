/**
 * Event Isolation Pipeline - Core Type Definitions
 */

export type { RawEvent, CohortField } from './rawEvent';
export {
  COHORT_FIELDS,
  AF_STATUS_FIELD,
  GROUPED_USER_PROPERTY_FIELDS,
  USER_ID_FIELDS,
} from './rawEvent';

export type { UserData, CleanEvent, CleanRecord } from './cleanRecord';

export type { IsolationInfo, IsolatedRecord, NotFoundNotice } from './isolatedRecord';
