import { describe, expect, it } from '@jest/globals';
import type { OrderState } from '../src/core/types.js';
import { STATUS_TABLES, isMappedStatus, toOrderState, type BrokerVocabulary } from '../src/execution/statusMap.js';

const MAPPINGS: Array<[BrokerVocabulary, string, OrderState]> = [
  ['ib', 'PendingSubmit', 'Pending'],
  ['ib', 'PreSubmitted', 'Submitted'],
  ['ib', 'PendingCancel', 'Cancelled'],
  ['ib', 'ApiCancelled', 'Cancelled'],
  ['ib', 'Filled', 'Filled'],
  ['schwab', 'AWAITING_PARENT_ORDER', 'Pending'],
  ['schwab', 'WORKING', 'Submitted'],
  ['schwab', 'PENDING_CANCEL', 'Pending'],
  ['schwab', 'EXPIRED', 'Cancelled'],
  ['schwab', 'REJECTED', 'Rejected'],
  ['alpaca', 'partially_filled', 'PartiallyFilled'],
  ['alpaca', 'pending_cancel', 'Submitted'],
  ['alpaca', 'expired', 'Cancelled'],
  ['sim', 'working', 'Submitted'],
  ['sim', 'filled', 'Filled'],
];

describe('toOrderState', () => {
  it.each(MAPPINGS)('maps %s status %s to %s', (vocabulary, status, expected) => {
    expect(toOrderState(vocabulary, status)).toBe(expected);
  });

  it('maps anything unlisted to Unknown', () => {
    expect(toOrderState('ib', 'Exploded')).toBe('Unknown');
    expect(toOrderState('alpaca', 'FILLED')).toBe('Unknown');
    expect(toOrderState('sim', 'toString')).toBe('Unknown');
    expect(isMappedStatus('schwab', 'constructor')).toBe(false);
  });

  it('has a table for every vocabulary', () => {
    expect(Object.keys(STATUS_TABLES).sort()).toEqual(['alpaca', 'ib', 'schwab', 'sim']);
  });
});
