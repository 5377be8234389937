import type { TurnRole } from './types.js';

/**
 * Multipliers and thresholds of the importance heuristic.
 * The values are tuning constants; override them per store as needed.
 */
export interface ImportanceWeights {
  /** Applied to user turns */
  userRole: number;
  /** Applied when the content contains a question mark */
  question: number;
  /** Applied when tokenCount < shortTurnTokens */
  shortTurn: number;
  /** Applied when tokenCount > longTurnTokens */
  longTurn: number;
  shortTurnTokens: number;
  longTurnTokens: number;
}

export const DEFAULT_IMPORTANCE_WEIGHTS: Readonly<ImportanceWeights> = Object.freeze({
  userRole: 1.2,
  question: 1.1,
  shortTurn: 0.8,
  longTurn: 0.9,
  shortTurnTokens: 5,
  longTurnTokens: 500,
});

/**
 * Scores how much losing a turn would hurt coherence.
 *
 * Starts at 1.0 and applies, in order: the user-role bonus, the question
 * bonus, the short-turn penalty and the long-turn penalty.
 *
 * @example
 * ```ts
 * const scorer = new ImportanceScorer();
 * scorer.score('user', 'What is my budget?', 6);  // 1.2 * 1.1
 * scorer.score('assistant', 'Ok.', 1);            // 0.8
 * ```
 */
export class ImportanceScorer {
  readonly weights: Readonly<ImportanceWeights>;

  constructor(weights: Partial<ImportanceWeights> = {}) {
    this.weights = { ...DEFAULT_IMPORTANCE_WEIGHTS, ...weights };
  }

  score(role: TurnRole, content: string, tokenCount: number): number {
    const w = this.weights;
    let score = 1.0;

    if (role === 'user') {
      score *= w.userRole;
    }

    if (content.includes('?')) {
      score *= w.question;
    }

    if (tokenCount < w.shortTurnTokens) {
      score *= w.shortTurn;
    }

    if (tokenCount > w.longTurnTokens) {
      score *= w.longTurn;
    }

    return Math.max(0, score);
  }
}
