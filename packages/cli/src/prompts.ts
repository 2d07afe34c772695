/**
 * Task-specific prompt templates.
 *
 * Every template frames the model's role, lists what to look for, embeds the
 * source in a fenced block and ends with the user's question. The source is
 * embedded verbatim whatever its size.
 */

export const TASK_TYPES = ['review', 'debug', 'explain', 'optimize', 'general'] as const;

export type TaskType = (typeof TASK_TYPES)[number];

export interface PromptRequest {
  readonly task: TaskType;
  readonly context: string;
  readonly question: string;
  /** Fence language tag for the code block */
  readonly language?: string;
}

export const TASK_DESCRIPTIONS: Record<TaskType, string> = {
  review: 'Code review with quality analysis',
  debug: 'Debugging assistance with step-by-step guidance',
  explain: 'Educational explanations with teaching focus',
  optimize: 'Performance optimization recommendations',
  general: 'General code assistance (default)',
};

export function isTaskType(value: string): value is TaskType {
  return (TASK_TYPES as readonly string[]).includes(value);
}

/** Map a task name to a known category; anything unknown becomes `general`. */
export function resolveTaskType(name: string | undefined): TaskType {
  const lower = (name ?? '').trim().toLowerCase();
  return isTaskType(lower) ? lower : 'general';
}

type Template = (code: string, question: string) => string;

const TEMPLATES: Record<TaskType, Template> = {
  review: (code, question) => `You are an expert code reviewer. Analyze the following code for:
- Code quality and best practices
- Potential bugs or issues
- Security vulnerabilities
- Performance improvements
- Documentation and comments

Provide specific, actionable feedback with examples where appropriate.

Code to review:
${code}

Question: ${question}`,

  debug: (code, question) => `You are an expert debugger. The user needs help debugging this code. Analyze for:
- Logic errors and incorrect assumptions
- Runtime issues and exceptions
- Edge cases not handled
- Missing error handling
- Potential infinite loops or recursion

Provide step-by-step debugging guidance with explanations.

Code to debug:
${code}

Question: ${question}`,

  explain: (code, question) => `You are a helpful programming teacher. Explain this code clearly and simply:
- What the code does
- How it works
- Key concepts and patterns used
- What each major section does

Use analogies or simple language when helpful.

Code to explain:
${code}

Question: ${question}`,

  optimize: (code, question) => `You are a performance optimization expert. Analyze this code for:
- Algorithmic improvements
- Memory usage optimization
- Bottleneck identification
- Parallelization opportunities
- Language-specific optimizations

Provide concrete optimization suggestions with code examples.

Code to optimize:
${code}

Question: ${question}`,

  general: (code, question) => `You are a helpful coding assistant. Analyze the following code:

${code}

Question: ${question}

Please provide a helpful response focusing on code analysis and improvement suggestions.`,
};

function fence(context: string, language: string): string {
  return `\`\`\`${language}\n${context}\n\`\`\``;
}

/** Build the full instruction text sent to the model. */
export function buildPrompt(request: PromptRequest): string {
  const template = TEMPLATES[resolveTaskType(request.task)];
  return template(fence(request.context, request.language ?? 'python'), request.question);
}
