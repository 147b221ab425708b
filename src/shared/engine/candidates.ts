import { CandidateSet, PieceType, PIECE_TYPES } from '../types/game';

const TYPE_BITS: Readonly<Record<PieceType, number>> = {
  pawn: 1 << 0,
  lance: 1 << 1,
  knight: 1 << 2,
  silver: 1 << 3,
  gold: 1 << 4,
  rook: 1 << 5,
  bishop: 1 << 6,
  king: 1 << 7,
};

export const EMPTY_CANDIDATES: CandidateSet = 0;

export const ALL_CANDIDATES: CandidateSet = PIECE_TYPES.reduce(
  (mask, type) => mask | TYPE_BITS[type],
  EMPTY_CANDIDATES
);

export function candidateSetOf(types: Iterable<PieceType>): CandidateSet {
  let mask = EMPTY_CANDIDATES;
  for (const type of types) {
    mask |= TYPE_BITS[type];
  }
  return mask;
}

export function singletonOf(type: PieceType): CandidateSet {
  return TYPE_BITS[type];
}

export function hasCandidate(set: CandidateSet, type: PieceType): boolean {
  return (set & TYPE_BITS[type]) !== 0;
}

export function withoutCandidate(set: CandidateSet, type: PieceType): CandidateSet {
  return set & ~TYPE_BITS[type] & ALL_CANDIDATES;
}

export function isSingletonOf(set: CandidateSet, type: PieceType): boolean {
  return set === TYPE_BITS[type];
}

export function candidateCount(set: CandidateSet): number {
  let count = 0;
  for (const type of PIECE_TYPES) {
    if (hasCandidate(set, type)) count++;
  }
  return count;
}

/** Member types in {@link PIECE_TYPES} order. */
export function candidateTypes(set: CandidateSet): PieceType[] {
  return PIECE_TYPES.filter((type) => hasCandidate(set, type));
}

/**
 * Keep only the types for which `predicate` holds. The result is always a
 * subset of `set`.
 */
export function filterCandidates(
  set: CandidateSet,
  predicate: (type: PieceType) => boolean
): CandidateSet {
  let mask = EMPTY_CANDIDATES;
  for (const type of PIECE_TYPES) {
    if (hasCandidate(set, type) && predicate(type)) {
      mask |= TYPE_BITS[type];
    }
  }
  return mask;
}
