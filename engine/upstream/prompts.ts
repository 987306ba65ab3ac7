// engine/upstream/prompts.ts — Short task instructions sent ahead of each context bundle

import type { TaskKind } from '../types.js';

export const TASK_INSTRUCTIONS: Record<TaskKind, string> = {
  'commit-review':
    'Review the commit below. Summarize what changed and why it matters, then list risks, ' +
    'likely bugs and missing tests. Answer in Markdown.',
  'pull-request-review':
    'Review the pull request below as a senior engineer would. Start with a short summary, ' +
    'then give concrete, file-referenced feedback. Answer in Markdown.',
  'trend-report':
    'Describe the development trends shown by the commit statistics below: where effort goes, ' +
    'which areas are most active and anything unusual. Answer in Markdown.',
  'trend-classification':
    'Classify each commit below into exactly one category: feature, fix, perf, refactor, docs, ' +
    'test or other. Respond with JSON only, shaped as ' +
    '{"commits":[{"sha":"<sha>","category":"<category>"}]}.',
  'tech-debt':
    'Assess the technical debt in the most frequently changed files below. Point out overly ' +
    'complex functions, duplication, unclear responsibilities and tight coupling, quoting the ' +
    'code involved, then finish with the two or three items most worth fixing first. Answer in Markdown.',
  overview:
    'Give an overview of the repository below: its purpose, structure, main technologies and ' +
    'recent activity. Answer in Markdown.',
  'chat-answer':
    'Answer the question at the end using the repository context and the earlier conversation. ' +
    'Say so when the context does not contain the answer. Answer in Markdown.',
};
