import { compareDates } from '../domain/dates';
import { compareAmounts } from '../domain/money';
import { Claim, ClaimPayment } from '../domain/types';

/** A candidate together with its position in the input feed. */
export interface Ranked<T> {
  item: T;
  index: number;
}

/**
 * Orders two candidates for the same key. A negative result means `left`
 * is the more authoritative record and wins.
 */
export interface TieBreakPolicy<T> {
  name: string;
  compare(left: Ranked<T>, right: Ranked<T>): number;
}

const byInputOrder = <T>(left: Ranked<T>, right: Ranked<T>): number => left.index - right.index;
const byLatestInput = <T>(left: Ranked<T>, right: Ranked<T>): number => right.index - left.index;

const nullableAmountDescending = (left: number | null, right: number | null): number => {
  if (left === null && right === null) return 0;
  if (left === null) return 1;
  if (right === null) return -1;
  return compareAmounts(right, left);
};

export interface PaymentCandidate {
  paidAmount: number | null;
  checkDate: Date | null;
}

/**
 * "Most authoritative payment record wins": largest paid amount, then most
 * recent check date, then first in input order.
 */
export const paymentAuthorityPolicy = <T extends PaymentCandidate>(): TieBreakPolicy<T> => ({
  name: 'largest-paid-then-latest-check-then-first',
  compare: (left, right) =>
    nullableAmountDescending(left.item.paidAmount, right.item.paidAmount) ||
    compareDates(right.item.checkDate, left.item.checkDate) ||
    byInputOrder(left, right),
});

/** Latest tracking activity wins; later input rows win ties. */
export const latestClaimRevisionPolicy: TieBreakPolicy<Claim> = {
  name: 'latest-tracking-date-then-last',
  compare: (left, right) =>
    compareDates(right.item.lastTrackingDate, left.item.lastTrackingDate) || byLatestInput(left, right),
};

/** Most recently created payment row wins; later input rows win ties. */
export const latestPaymentRecordPolicy: TieBreakPolicy<ClaimPayment> = {
  name: 'latest-created-then-last',
  compare: (left, right) => compareDates(right.item.createdAt, left.item.createdAt) || byLatestInput(left, right),
};

/** Lowest claim id wins; earlier input rows win ties. */
export const lowestClaimIdPolicy = <T extends { claimId: number }>(): TieBreakPolicy<T> => ({
  name: 'lowest-claim-id-then-first',
  compare: (left, right) => left.item.claimId - right.item.claimId || byInputOrder(left, right),
});
