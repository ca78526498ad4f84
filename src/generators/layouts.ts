import { readFileSync } from 'fs';
import path from 'path';
import { DocsError, DocsErrorCode, errorMessage } from '../shared/errors.js';

export const LAYOUTS = [
  'saas',
  'blog',
  'social',
  'kanban',
  'inbox',
  'profile',
  'docs',
  'dashboard',
  'auth',
  'store',
] as const;

export type LayoutName = (typeof LAYOUTS)[number];

export const TEMPLATE_DIR = path.join(__dirname, '..', '..', 'templates', 'layouts');

const TITLE_PLACEHOLDER = /\{\{title\}\}/g;
const MAX_TITLE_LENGTH = 100;

/** Keeps letters, digits, whitespace, '-' and '_'; at most 100 characters. */
export function sanitizeTitle(text: string): string {
  return Array.from(text)
    .filter(ch => /[\p{L}\p{N}\s_-]/u.test(ch))
    .slice(0, MAX_TITLE_LENGTH)
    .join('');
}

export function isLayoutName(value: string): value is LayoutName {
  return (LAYOUTS as readonly string[]).includes(value);
}

/** Page skeletons read from templates/layouts/<name>.html, filled with a sanitised title. */
export class LayoutEngine {
  private readonly templates: ReadonlyMap<LayoutName, string>;

  constructor(templateDir: string = TEMPLATE_DIR) {
    const templates = new Map<LayoutName, string>();
    for (const name of LAYOUTS) {
      const file = path.join(templateDir, `${name}.html`);
      try {
        templates.set(name, readFileSync(file, 'utf-8').trim());
      } catch (err) {
        throw new DocsError(DocsErrorCode.CORPUS_UNAVAILABLE, `Missing layout template: ${file}`, {
          cause: errorMessage(err),
        });
      }
    }
    this.templates = templates;
  }

  listLayouts(): LayoutName[] {
    return [...LAYOUTS];
  }

  generate(layout: LayoutName, title: string): string {
    const template = this.templates.get(layout) ?? '';
    const safeTitle = sanitizeTitle(title);
    return template.replace(TITLE_PLACEHOLDER, () => safeTitle);
  }
}
