import { sectionOf, subsectionOf } from './rowMatcher';
import type { QuestionResult, StatCounts, StatTables } from '../types/results';

interface GroupStats extends StatCounts {
  id: string;
}

/**
 * Group questions by a key and count correct answers per group.
 *
 * Results are sorted hardest first (ascending accuracy). The sort is stable
 * and groups are created in first-encounter order, so equal accuracies keep
 * the order in which each group first appeared.
 */
export function computeGroupStats(
  questions: readonly QuestionResult[],
  keyOf: (questionId: string) => string
): GroupStats[] {
  const groups = new Map<string, { attempts: number; correct: number }>();

  for (const q of questions) {
    const id = keyOf(q.question_id);
    const group = groups.get(id) ?? { attempts: 0, correct: 0 };
    group.attempts++;
    if (q.is_correct) {
      group.correct++;
    }
    groups.set(id, group);
  }

  return Array.from(groups.entries())
    .map(([id, { attempts, correct }]) => ({
      id,
      attempts,
      correct,
      incorrect: attempts - correct,
      accuracy: attempts > 0 ? correct / attempts : 0,
    }))
    .sort((a, b) => a.accuracy - b.accuracy);
}

/**
 * Per-question, per-section and per-subsection accuracy over a flat list of
 * graded questions. The three groupings are independent of each other.
 */
export function aggregateStats(questions: readonly QuestionResult[]): StatTables {
  return {
    question_stats: computeGroupStats(questions, (id) => id).map(({ id, ...counts }) => ({
      question_id: id,
      ...counts,
    })),
    section_stats: computeGroupStats(questions, sectionOf).map(({ id, ...counts }) => ({
      section_id: id,
      ...counts,
    })),
    subsection_stats: computeGroupStats(questions, subsectionOf).map(({ id, ...counts }) => ({
      subsection_id: id,
      ...counts,
    })),
  };
}
