// packages/game-core/src/candidateEngine.ts
//
// Entropy-guided candidate reduction.
//
// The engine owns the set of codes still consistent with every feedback
// observation. For a prospective guess it buckets the candidates by the
// feedback they *would* produce; the Shannon entropy of that partition is the
// expected number of bits the guess reveals when the secret is uniform over
// the candidates. The best guess is the one maximizing it.
//
// Exports:
//   • CandidateEngine → per-game candidate tracker (one instance per game).

import {
  formatCode,
  isCode,
  sameCode,
  toCode,
  UNIVERSE,
  type Code,
} from './code.js';
import {
  EmptyCandidateSetError,
  EmptyPoolError,
  InvalidNumberError,
} from './errors.js';
import {
  isFeedback,
  scoreKey,
  toKey,
  type Feedback,
} from './scoring.js';

/** Number of distinct feedback keys (bulls·5 + cows ≤ 24). */
const KEY_SPACE = 25;

// Gains closer than this are treated as tied, so float noise in the
// summation order cannot reorder equivalent guesses.
const TIE_EPSILON = 1e-12;

export class CandidateEngine {
  private set: readonly Code[];

  /**
   * @param initial starting candidates; copied, validated and deduplicated
   * @throws InvalidNumberError if an entry is not 4 unique digits
   */
  constructor(initial: readonly Code[] = UNIVERSE) {
    this.set = initial === UNIVERSE ? UNIVERSE : distinctCodes(initial);
  }

  get size(): number {
    return this.set.length;
  }

  /** Snapshot of the current candidates, valid until the next prune(). */
  get candidates(): readonly Code[] {
    return this.set;
  }

  has(code: Code): boolean {
    return this.set.some((c) => sameCode(c, code));
  }

  /** log2 of the number of remaining candidates, in bits. */
  uncertainty(): number {
    this.assertNotEmpty();
    return Math.log2(this.set.length);
  }

  /**
   * expectedInformationGain returns the entropy (bits) of the partition of
   * candidates induced by `guess`. The guess need not be a candidate.
   *
   * On a fresh engine every guess scores the same: the universe is
   * symmetric under relabelling digits and positions.
   */
  expectedInformationGain(guess: Code): number {
    assertCode(guess);
    this.assertNotEmpty();
    const counts = new Array<number>(KEY_SPACE).fill(0);
    for (const c of this.set) counts[scoreKey(c, guess)]++;

    const total = this.set.length;
    let entropy = 0;
    for (const count of counts) {
      if (count === 0) continue;
      const p = count / total;
      entropy -= p * Math.log2(p);
    }
    return entropy;
  }

  /**
   * suggestBestGuess picks the guess in `pool` with the highest expected
   * information gain. Ties go to the earliest guess in pool order.
   *
   * Pass UNIVERSE as the pool to allow exploratory guesses that cannot be
   * the secret; the default searches only the remaining candidates.
   *
   * @throws EmptyCandidateSetError if no candidates remain
   * @throws EmptyPoolError if `pool` is empty
   */
  suggestBestGuess(pool: readonly Code[] = this.set): Code {
    this.assertNotEmpty();
    if (pool.length === 0) throw new EmptyPoolError();

    let best = pool[0];
    let bestGain = -Infinity;
    for (const guess of pool) {
      const gain = this.expectedInformationGain(guess);
      if (gain > bestGain + TIE_EPSILON) {
        best = guess;
        bestGain = gain;
      }
    }
    return best;
  }

  /**
   * prune keeps only the candidates that would have produced `observed` for
   * `guess`. Irreversible. Inconsistent feedback may empty the set; that is
   * reported by the next uncertainty()/expectedInformationGain() call.
   */
  prune(guess: Code, observed: Feedback): void {
    assertCode(guess);
    // Feedback no pair of codes can produce matches nothing.
    const want = isFeedback(observed) ? toKey(observed) : -1;
    this.set = this.set.filter((c) => scoreKey(c, guess) === want);
  }

  private assertNotEmpty(): void {
    if (this.set.length === 0) throw new EmptyCandidateSetError();
  }
}

function distinctCodes(codes: readonly Code[]): readonly Code[] {
  const byKey = new Map<string, Code>();
  for (const c of codes) {
    const code = toCode(c);
    const key = formatCode(code);
    if (!byKey.has(key)) byKey.set(key, code);
  }
  return Object.freeze([...byKey.values()]);
}

function assertCode(value: Code): void {
  if (!isCode(value)) throw new InvalidNumberError(value);
}
