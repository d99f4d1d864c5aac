import { CATEGORY_GROUPS, CategoryGroup, ScoredDeal } from "../types";
import { isNumber, roundHalfEven } from "../../util/numbers";

export type TieBreakKey = [number, number, number, number, number];

export type CategoryAllocation = Record<CategoryGroup, number>;

type CategoryBuckets = Record<CategoryGroup, ScoredDeal[]>;

export const categorizeDeal = (category: string | null | undefined): CategoryGroup => {
  const upper = (category ?? "").toUpperCase();
  if (upper.includes("MEAT") || upper.includes("SEAFOOD") || upper.includes("DELI")) {
    return "MeatSeafood";
  }
  if (upper.includes("PRODUCE")) {
    return "Produce";
  }
  return "SnacksOther";
};

/**
 * Ordering key, lower is better: higher score, priority, higher savings
 * percent, lower unit price, lower raw price.
 */
export const tieBreakKey = (deal: ScoredDeal): TieBreakKey => {
  const savingsPercent = deal.price?.savings_percent;
  const amount = deal.price?.amount;
  return [
    -deal.engagement_score,
    deal.is_priority ? -1 : 0,
    -(isNumber(savingsPercent) ? savingsPercent : -1),
    isNumber(deal.unit_price_amount) ? deal.unit_price_amount : Infinity,
    isNumber(amount) ? amount : Infinity,
  ];
};

export const compareTieBreak = (a: ScoredDeal, b: ScoredDeal): number => {
  const keyA = tieBreakKey(a);
  const keyB = tieBreakKey(b);
  for (let i = 0; i < keyA.length; i++) {
    if (keyA[i] < keyB[i]) return -1;
    if (keyA[i] > keyB[i]) return 1;
  }
  return 0;
};

export const sortByTieBreak = (deals: readonly ScoredDeal[]): ScoredDeal[] =>
  [...deals].sort(compareTieBreak);

const emptyAllocation = (): CategoryAllocation => ({ MeatSeafood: 0, Produce: 0, SnacksOther: 0 });

const bucketize = (deals: readonly ScoredDeal[]): CategoryBuckets => {
  const buckets: CategoryBuckets = { MeatSeafood: [], Produce: [], SnacksOther: [] };
  for (const deal of deals) {
    buckets[deal.category_group].push(deal);
  }
  return buckets;
};

const allocatedTotal = (allocation: CategoryAllocation): number =>
  CATEGORY_GROUPS.reduce((sum, group) => sum + allocation[group], 0);

/**
 * Splits the open slots across the three category buckets in proportion to
 * their inventory, then corrects rounding one slot at a time: an extra slot
 * goes to the bucket with the strongest next candidate, a surplus slot is
 * taken from the bucket holding the weakest allocated candidate. Buckets
 * must already be in tie-break order.
 */
export const allocateSlots = (
  buckets: Readonly<Record<CategoryGroup, readonly ScoredDeal[]>>,
  remainingSlots: number,
): CategoryAllocation => {
  const allocation = emptyAllocation();
  const totalAvailable = CATEGORY_GROUPS.reduce((sum, group) => sum + buckets[group].length, 0);
  if (totalAvailable === 0) {
    return allocation;
  }

  for (const group of CATEGORY_GROUPS) {
    const available = buckets[group].length;
    if (available === 0) continue;
    const share = roundHalfEven(remainingSlots * (available / totalAvailable));
    allocation[group] = Math.min(share, available);
  }

  while (allocatedTotal(allocation) < remainingSlots) {
    let bestGroup: CategoryGroup | null = null;
    let bestNext: ScoredDeal | null = null;
    for (const group of CATEGORY_GROUPS) {
      if (allocation[group] >= buckets[group].length) continue;
      const candidate = buckets[group][allocation[group]];
      if (bestNext === null || compareTieBreak(candidate, bestNext) < 0) {
        bestNext = candidate;
        bestGroup = group;
      }
    }
    if (bestGroup === null) break;
    allocation[bestGroup] += 1;
  }

  while (allocatedTotal(allocation) > remainingSlots) {
    let worstGroup: CategoryGroup | null = null;
    let worstItem: ScoredDeal | null = null;
    for (const group of CATEGORY_GROUPS) {
      if (allocation[group] <= 0) continue;
      const allocated = buckets[group][allocation[group] - 1];
      if (worstItem === null || compareTieBreak(allocated, worstItem) > 0) {
        worstItem = allocated;
        worstGroup = group;
      }
    }
    if (worstGroup === null) break;
    allocation[worstGroup] -= 1;
  }

  return allocation;
};

export interface SelectionInput {
  priorityDeals: readonly ScoredDeal[];
  otherDeals: readonly ScoredDeal[];
  topN: number;
  balance: boolean;
}

/**
 * Picks the final top-N: priority deals first (capped at topN themselves),
 * then the remaining slots from the other deals, balanced across category
 * groups when requested. The result is in tie-break order.
 */
export const selectTopDeals = ({
  priorityDeals,
  otherDeals,
  topN,
  balance,
}: SelectionInput): ScoredDeal[] => {
  const priority = sortByTieBreak(priorityDeals);
  const others = sortByTieBreak(otherDeals);

  const remainingSlots = Math.max(0, topN - priority.length);
  if (remainingSlots <= 0) {
    return priority.slice(0, topN);
  }

  if (!balance) {
    return [...priority, ...others.slice(0, remainingSlots)].slice(0, topN);
  }

  const buckets = bucketize(others);
  const allocation = allocateSlots(buckets, remainingSlots);
  const added = CATEGORY_GROUPS.flatMap((group) => buckets[group].slice(0, allocation[group]));

  if (added.length < remainingSlots) {
    const addedIds = new Set(added.map((deal) => deal.deal_id));
    for (const deal of others) {
      if (added.length >= remainingSlots) break;
      if (addedIds.has(deal.deal_id)) continue;
      added.push(deal);
    }
  }

  return sortByTieBreak([...priority, ...added]).slice(0, topN);
};
