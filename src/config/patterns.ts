// Classifier tables. Order is significant: the first entry wins ties.

export interface RolePattern {
  role: string;
  pattern: RegExp;
}

export interface TaskTypePattern {
  taskType: string;
  pattern: RegExp;
  keywords: readonly string[];
}

export interface TechniquePattern {
  technique: string;
  pattern: RegExp;
  priority: number;
}

export const DEFAULT_ROLE = 'Assistant';
export const DEFAULT_TASK_TYPE = 'default';
export const IDENTITY_TECHNIQUE = 'zero_shot';

export const ROLE_PATTERNS: readonly RolePattern[] = [
  {
    role: 'Mathematician',
    pattern: /(math|calculate|equation|solve|formula|\+|-|\*|\/|\^|log|sin|cos)/gi,
  },
  {
    role: 'Software Engineer',
    pattern: /(code|program|function|algorithm|class|API)/gi,
  },
  {
    role: 'Data Scientist',
    pattern: /(data|analysis|statistics|correlation|dataset|predict)/gi,
  },
  {
    role: 'Teacher',
    pattern: /(explain|teach|learn|understand|concept|example)/gi,
  },
  {
    role: 'Creative Writer',
    pattern: /(story|write|creative|narrative|plot|character)/gi,
  },
  {
    role: 'Business Analyst',
    pattern: /(business|market|strategy|analyze|ROI|profit)/gi,
  },
  {
    role: 'Physicist',
    pattern: /(physics|force|motion|energy|quantum|momentum)/gi,
  },
  {
    role: 'Biologist',
    pattern: /(biology|cell|organism|gene|evolution|species)/gi,
  },
  {
    role: 'Historian',
    pattern: /(history|century|period|war|civilization|empire)/gi,
  },
  {
    role: 'Psychologist',
    pattern: /(psychology|behavior|mental|cognitive|emotion)/gi,
  },
  {
    role: 'Financial Analyst',
    pattern: /(finance|stock|investment|market|portfolio|risk)/gi,
  },
  {
    role: 'Language Expert',
    pattern: /(grammar|language|sentence|word|phrase|meaning)/gi,
  },
  {
    role: 'Systems Architect',
    pattern: /(system|architecture|design|infrastructure|scalability)/gi,
  },
  {
    role: 'Product Manager',
    pattern: /(product|feature|user|requirement|roadmap|market)/gi,
  },
];

export const TASK_TYPE_PATTERNS: readonly TaskTypePattern[] = [
  {
    taskType: 'math',
    pattern: /(math|calculate|equation|solve|\+|-|\*|\/|formula)/gi,
    keywords: ['solve', 'calculate', 'equation', 'formula', 'computation'],
  },
  {
    taskType: 'coding',
    pattern: /(code|program|function|algorithm|implementation)/gi,
    keywords: ['implement', 'code', 'function', 'class', 'method'],
  },
  {
    taskType: 'creative_writing',
    pattern: /(story|write|creative|narrative|plot)/gi,
    keywords: ['write', 'compose', 'create', 'story', 'narrative'],
  },
  {
    taskType: 'analysis',
    pattern: /(analyze|examine|study|investigate|evaluate)/gi,
    keywords: ['analyze', 'examine', 'evaluate', 'assess', 'review'],
  },
  {
    taskType: 'explanation',
    pattern: /(explain|describe|what is|how does|why)/gi,
    keywords: ['explain', 'describe', 'clarify', 'elaborate', 'detail'],
  },
  {
    taskType: 'planning',
    pattern: /(plan|strategy|approach|method|steps)/gi,
    keywords: ['plan', 'organize', 'prepare', 'arrange', 'structure'],
  },
  {
    taskType: 'research',
    pattern: /(research|study|investigate|explore|literature)/gi,
    keywords: ['research', 'investigate', 'study', 'explore', 'examine'],
  },
  {
    taskType: 'translation',
    pattern: /(translate|convert|language|meaning|phrase)/gi,
    keywords: ['translate', 'convert', 'transform', 'change', 'adapt'],
  },
  {
    taskType: 'summarization',
    pattern: /(summarize|brief|overview|recap|digest)/gi,
    keywords: ['summarize', 'condense', 'shorten', 'brief', 'synopsis'],
  },
];

export const TECHNIQUE_PATTERNS: readonly TechniquePattern[] = [
  {
    technique: 'chain_of_thought',
    pattern:
      /(solve|calculate|compute|equation|step-by-step|prove|derive|reason)/gi,
    priority: 3,
  },
  {
    technique: 'tree_of_thought',
    pattern: /(analyze|compare|trade-offs|alternatives|options|impact)/gi,
    priority: 2,
  },
  {
    technique: 'structured_output',
    pattern: /(strategy|plan|outline|list|format|report|table)/gi,
    priority: 2,
  },
  {
    technique: 'self_consistency',
    pattern: /(verify|double-check|confirm|consistent)/gi,
    priority: 2,
  },
  {
    technique: 'socratic',
    pattern: /(why|explain|understand|what is|how does)/gi,
    priority: 1,
  },
  {
    technique: 'few_shot',
    pattern: /(examples?|similar to|pattern)/gi,
    priority: 1,
  },
  {
    technique: 'role_playing',
    pattern: /(story|poem|pretend|imagine|act as|character)/gi,
    priority: 1,
  },
  {
    technique: 'guided_conversation',
    pattern: /(discuss|guide|walk me through)/gi,
    priority: 1,
  },
];

// Arithmetic action verbs that signal a wrapped math prompt.
export const MATH_ACTION_PATTERN = /(calculate|solve|compute|evaluate)/i;
