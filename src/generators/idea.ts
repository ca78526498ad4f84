import type { LayoutName } from './layouts.js';

interface IdeaRule {
  layout: LayoutName;
  keywords: string[];
}

// First match wins, so the order matters: "task board" is a kanban, not a dashboard.
const IDEA_RULES: IdeaRule[] = [
  { layout: 'blog', keywords: ['blog', 'article', 'news'] },
  { layout: 'social', keywords: ['social', 'twitter', 'feed'] },
  { layout: 'kanban', keywords: ['kanban', 'trello', 'board', 'task'] },
  { layout: 'inbox', keywords: ['mail', 'inbox', 'message'] },
  { layout: 'profile', keywords: ['profile', 'settings', 'account'] },
  { layout: 'docs', keywords: ['docs', 'documentation', 'wiki'] },
  { layout: 'saas', keywords: ['saas', 'startup', 'landing'] },
  { layout: 'dashboard', keywords: ['dashboard', 'admin'] },
];

export const IDEA_TITLE = 'Generated UI';

/** Picks a layout for a free-text prompt by substring keywords; falls back to saas. */
export function chooseLayout(prompt: string): LayoutName {
  const p = prompt.toLowerCase();
  const rule = IDEA_RULES.find(r => r.keywords.some(k => p.includes(k)));
  return rule?.layout ?? 'saas';
}
