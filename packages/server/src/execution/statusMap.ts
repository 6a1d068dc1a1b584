import type { OrderState } from '../core/types.js';

export type BrokerVocabulary = 'ib' | 'schwab' | 'alpaca' | 'sim';

type StatusTable = Readonly<Record<string, OrderState>>;

// IB counts a pending cancel as cancelled; Schwab counts pending cancel and replace as pending.
const IB_STATUSES: StatusTable = {
  ApiPending: 'Pending',
  PendingSubmit: 'Pending',
  Inactive: 'Pending',
  PreSubmitted: 'Submitted',
  Submitted: 'Submitted',
  PendingCancel: 'Cancelled',
  ApiCancelled: 'Cancelled',
  Cancelled: 'Cancelled',
  Filled: 'Filled',
};

const SCHWAB_STATUSES: StatusTable = {
  AWAITING_PARENT_ORDER: 'Pending',
  AWAITING_CONDITION: 'Pending',
  AWAITING_STOP_CONDITION: 'Pending',
  AWAITING_MANUAL_REVIEW: 'Pending',
  AWAITING_UR_OUT: 'Pending',
  AWAITING_RELEASE_TIME: 'Pending',
  PENDING_ACTIVATION: 'Pending',
  PENDING_ACKNOWLEDGEMENT: 'Pending',
  NEW: 'Pending',
  ACCEPTED: 'Submitted',
  QUEUED: 'Submitted',
  WORKING: 'Submitted',
  PENDING_CANCEL: 'Pending',
  PENDING_REPLACE: 'Pending',
  PENDING_RECALL: 'Submitted',
  FILLED: 'Filled',
  CANCELED: 'Cancelled',
  REPLACED: 'Cancelled',
  EXPIRED: 'Cancelled',
  REJECTED: 'Rejected',
};

const ALPACA_STATUSES: StatusTable = {
  pending_new: 'Pending',
  accepted_for_bidding: 'Pending',
  new: 'Submitted',
  accepted: 'Submitted',
  held: 'Submitted',
  calculated: 'Submitted',
  pending_cancel: 'Submitted',
  pending_replace: 'Submitted',
  done_for_day: 'Submitted',
  stopped: 'Submitted',
  suspended: 'Submitted',
  partially_filled: 'PartiallyFilled',
  filled: 'Filled',
  canceled: 'Cancelled',
  expired: 'Cancelled',
  replaced: 'Cancelled',
  rejected: 'Rejected',
};

const SIM_STATUSES: StatusTable = {
  pending: 'Pending',
  working: 'Submitted',
  partial: 'PartiallyFilled',
  filled: 'Filled',
  cancelled: 'Cancelled',
  rejected: 'Rejected',
};

export const STATUS_TABLES: Readonly<Record<BrokerVocabulary, StatusTable>> = {
  ib: IB_STATUSES,
  schwab: SCHWAB_STATUSES,
  alpaca: ALPACA_STATUSES,
  sim: SIM_STATUSES,
};

export function isMappedStatus(vocabulary: BrokerVocabulary, status: string): boolean {
  return Object.prototype.hasOwnProperty.call(STATUS_TABLES[vocabulary], status);
}

/**
 * Maps a broker-native status onto the canonical order state. Anything the table
 * does not list maps to Unknown.
 */
export function toOrderState(vocabulary: BrokerVocabulary, status: string): OrderState {
  if (!isMappedStatus(vocabulary, status)) return 'Unknown';
  return STATUS_TABLES[vocabulary][status];
}
