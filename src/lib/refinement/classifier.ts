import {
  DEFAULT_ROLE,
  DEFAULT_TASK_TYPE,
  IDENTITY_TECHNIQUE,
  ROLE_PATTERNS,
  TASK_TYPE_PATTERNS,
  TECHNIQUE_PATTERNS,
} from '../../config/patterns.js';

export interface Classification {
  role: string;
  taskType: string;
  technique: string;
}

function countMatches(pattern: RegExp, text: string): number {
  return text.match(pattern)?.length ?? 0;
}

// Highest match count wins; earlier entries keep ties.
export function detectRole(query: string): string {
  let role = DEFAULT_ROLE;
  let bestCount = 0;

  for (const entry of ROLE_PATTERNS) {
    const count = countMatches(entry.pattern, query);
    if (count > bestCount) {
      role = entry.role;
      bestCount = count;
    }
  }

  return role;
}

export function scoreTaskTypes(query: string): Map<string, number> {
  const lowered = query.toLowerCase();
  const scores = new Map<string, number>();

  for (const entry of TASK_TYPE_PATTERNS) {
    const keywordHits = entry.keywords.filter((keyword) =>
      lowered.includes(keyword)
    ).length;
    scores.set(
      entry.taskType,
      2 * countMatches(entry.pattern, query) + keywordHits
    );
  }

  return scores;
}

export function detectTaskType(query: string): string {
  let taskType = DEFAULT_TASK_TYPE;
  let bestScore = 0;

  for (const [candidate, score] of scoreTaskTypes(query)) {
    if (score > bestScore) {
      taskType = candidate;
      bestScore = score;
    }
  }

  return taskType;
}

// Lexicographic maximum of (match count, priority).
export function detectTechnique(query: string): string {
  let technique = IDENTITY_TECHNIQUE;
  let bestCount = 0;
  let bestPriority = Number.NEGATIVE_INFINITY;

  for (const entry of TECHNIQUE_PATTERNS) {
    const count = countMatches(entry.pattern, query);
    if (count === 0) continue;
    const better =
      count > bestCount ||
      (count === bestCount && entry.priority > bestPriority);
    if (better) {
      technique = entry.technique;
      bestCount = count;
      bestPriority = entry.priority;
    }
  }

  return technique;
}

export function classify(query: string): Classification {
  return {
    role: detectRole(query),
    taskType: detectTaskType(query),
    technique: detectTechnique(query),
  };
}
