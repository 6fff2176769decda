export { DEFAULT_FILTER_OPTIONS, evaluateKit, filterKits, findOverflow } from './kit-filter';
export { OVERFLOW_POLICIES } from './types';
export type {
  AcceptedKit,
  CategoryOverflow,
  FilterOptions,
  FilterResult,
  KitVerdict,
  OverflowPolicy,
  RejectedKit,
  RejectionDetails,
  RejectionReason,
} from './types';
