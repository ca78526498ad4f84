import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { QueryEngine } from './query/engine.js';
import { renderConcept, type ConceptCatalog } from './concepts/catalog.js';
import { LAYOUTS, type LayoutEngine } from './generators/layouts.js';
import { chooseLayout, IDEA_TITLE } from './generators/idea.js';
import { createChart, createTable, generateTheme, getScript, scaffoldForm } from './generators/snippets.js';
import { DocsError, DocsErrorCode } from './shared/errors.js';

/** Read-only collaborators every handler may use; built once at startup. */
export interface ToolContext {
  engine: QueryEngine;
  concepts: ConceptCatalog;
  layouts: LayoutEngine;
}

export const TOOL_NAMES = [
  'daisyui_list_components',
  'daisyui_get_docs',
  'daisyui_search',
  'daisyui_get_concept',
  'daisyui_list_concepts',
  'daisyui_list_layouts',
  'daisyui_scaffold_layout',
  'daisyui_idea_to_ui',
  'daisyui_scaffold_dashboard',
  'daisyui_scaffold_auth',
  'daisyui_scaffold_store',
  'daisyui_create_chart',
  'daisyui_create_table',
  'daisyui_generate_theme',
  'daisyui_scaffold_form',
  'daisyui_get_script',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

interface ToolDef<N extends ToolName, S extends z.ZodTypeAny> {
  name: N;
  description: string;
  inputSchema: S;
  handler: (args: z.output<S>, ctx: ToolContext) => string;
}

export interface RegisteredTool<N extends ToolName = ToolName> {
  readonly name: N;
  readonly description: string;
  readonly inputSchema: z.ZodTypeAny;
  /** Validates raw arguments against the schema, then runs the handler. */
  invoke(rawArgs: unknown, ctx: ToolContext): string;
}

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  inputSchema: ReturnType<typeof zodToJsonSchema>;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map(i => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ');
}

function defineTool<N extends ToolName, S extends z.ZodTypeAny>(def: ToolDef<N, S>): RegisteredTool<N> {
  return {
    name: def.name,
    description: def.description,
    inputSchema: def.inputSchema,
    invoke(rawArgs, ctx) {
      const parsed = def.inputSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new DocsError(
          DocsErrorCode.INVALID_PARAMS,
          `Invalid arguments for ${def.name}: ${formatIssues(parsed.error.issues)}`,
          { issues: parsed.error.issues }
        );
      }
      return def.handler(parsed.data, ctx);
    },
  };
}

const requiredText = (field: string) => z.string().trim().min(1, `${field} must not be empty`);

// ── Documentation tools ────────────────────────────────────────

const docsTools = {
  daisyui_list_components: defineTool({
    name: 'daisyui_list_components',
    description: 'List every documented DaisyUI component name.',
    inputSchema: z.object({}),
    handler: (_args, { engine }) => engine.listComponents().join(', '),
  }),
  daisyui_get_docs: defineTool({
    name: 'daisyui_get_docs',
    description: 'Get the documentation for one component by exact name (case-insensitive).',
    inputSchema: z.object({
      component: requiredText('component').describe('Component name, e.g. "button"'),
    }),
    handler: ({ component }, { engine }) =>
      engine.getDoc(component)?.body ?? `Documentation not found for '${component}'`,
  }),
  daisyui_search: defineTool({
    name: 'daisyui_search',
    description: 'Search component docs by keyword. Results are ranked by name match, body match and indexed terms.',
    inputSchema: z.object({
      query: z.string().default('').describe('Search keywords'),
    }),
    handler: ({ query }, { engine }) => {
      const results = engine.search(query);
      if (results.length === 0) return `No results found for '${query}'`;
      const lines = results.map(r => `- **${r.key}** (score: ${r.score})`);
      return `## Search Results for '${query}'\n\n${lines.join('\n')}`;
    },
  }),
};

// ── Design concepts ────────────────────────────────────────────

const conceptTools = {
  daisyui_get_concept: defineTool({
    name: 'daisyui_get_concept',
    description: 'Explain a design concept (e.g. glassmorphism) with the classes and a snippet to apply it.',
    inputSchema: z.object({
      concept: requiredText('concept').describe('Concept name, e.g. "glassmorphism"'),
    }),
    handler: ({ concept }, { concepts }) => {
      const found = concepts.getConcept(concept);
      if (found) return renderConcept(found);
      return `Concept '${concept}' not found. Available: ${concepts.listConcepts().join(', ')}`;
    },
  }),
  daisyui_list_concepts: defineTool({
    name: 'daisyui_list_concepts',
    description: 'List available design concepts.',
    inputSchema: z.object({}),
    handler: (_args, { concepts }) => concepts.listConcepts().join(', '),
  }),
};

// ── Generators ─────────────────────────────────────────────────

const generatorTools = {
  daisyui_list_layouts: defineTool({
    name: 'daisyui_list_layouts',
    description: 'List the page layouts daisyui_scaffold_layout can generate.',
    inputSchema: z.object({}),
    handler: (_args, { layouts }) => layouts.listLayouts().join(', '),
  }),
  daisyui_scaffold_layout: defineTool({
    name: 'daisyui_scaffold_layout',
    description: 'Generate a modern web layout skeleton.',
    inputSchema: z.object({
      layout: z.enum(LAYOUTS).describe('Layout type'),
      title: z.string().default('My App').describe('Title shown in the layout'),
    }),
    handler: ({ layout, title }, { layouts }) => layouts.generate(layout, title),
  }),
  daisyui_idea_to_ui: defineTool({
    name: 'daisyui_idea_to_ui',
    description: 'Turn a one-line product idea into a matching layout skeleton.',
    inputSchema: z.object({
      prompt: requiredText('prompt').describe('What the page is for, e.g. "a kanban board for my team"'),
    }),
    handler: ({ prompt }, { layouts }) => layouts.generate(chooseLayout(prompt), IDEA_TITLE),
  }),
  daisyui_scaffold_dashboard: defineTool({
    name: 'daisyui_scaffold_dashboard',
    description: 'Generate an admin dashboard layout (shortcut for the dashboard layout).',
    inputSchema: z.object({
      title: z.string().default('Dash'),
    }),
    handler: ({ title }, { layouts }) => layouts.generate('dashboard', title),
  }),
  daisyui_scaffold_auth: defineTool({
    name: 'daisyui_scaffold_auth',
    description: 'Generate a login or sign-up page (shortcut for the auth layout).',
    inputSchema: z.object({
      type: z.enum(['login', 'signup']).default('login'),
    }),
    handler: ({ type }, { layouts }) => layouts.generate('auth', type === 'login' ? 'Login' : 'Sign Up'),
  }),
  daisyui_scaffold_store: defineTool({
    name: 'daisyui_scaffold_store',
    description: 'Generate a storefront page (shortcut for the store layout).',
    inputSchema: z.object({
      page: z.string().default('home'),
    }),
    handler: ({ page }, { layouts }) => layouts.generate('store', page),
  }),
  daisyui_create_chart: defineTool({
    name: 'daisyui_create_chart',
    description: 'Generate a Chart.js canvas and init script.',
    inputSchema: z.object({
      type: z.enum(['bar', 'line', 'pie', 'doughnut', 'radar', 'polarArea', 'bubble', 'scatter']).default('bar'),
      id: z.string().default('c1').describe('Canvas element id'),
    }),
    handler: ({ type, id }) => createChart(type, id),
  }),
  daisyui_create_table: defineTool({
    name: 'daisyui_create_table',
    description: 'Generate a DaisyUI table with the given column headers.',
    inputSchema: z.object({
      columns: z.array(z.string()).default([]),
    }),
    handler: ({ columns }) => createTable(columns),
  }),
  daisyui_generate_theme: defineTool({
    name: 'daisyui_generate_theme',
    description: 'Generate a DaisyUI 5 custom theme block.',
    inputSchema: z.object({
      name: z.string().default('mytheme'),
      primary: z.string().default('#570df8'),
      secondary: z.string().default('#f000b8'),
      accent: z.string().default('#37cdbe'),
      base: z.string().default('#ffffff'),
    }),
    handler: args => generateTheme(args),
  }),
  daisyui_scaffold_form: defineTool({
    name: 'daisyui_scaffold_form',
    description: 'Generate a card form with one input per field.',
    inputSchema: z.object({
      title: z.string().default('Form'),
      fields: z
        .array(
          z.object({
            name: requiredText('field name'),
            type: z.string().optional(),
            label: z.string().optional(),
          })
        )
        .default([]),
    }),
    handler: ({ title, fields }) => scaffoldForm(title, fields),
  }),
  daisyui_get_script: defineTool({
    name: 'daisyui_get_script',
    description: 'Get the JavaScript needed to drive an interactive component (modal, drawer).',
    inputSchema: z.object({
      component: requiredText('component'),
    }),
    handler: ({ component }) => getScript(component),
  }),
};

const TOOLS: { readonly [N in ToolName]: RegisteredTool<N> } = {
  ...docsTools,
  ...conceptTools,
  ...generatorTools,
};

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

/**
 * The closed tool table. Discovery (`listTools`) and invocation (`get`) read
 * the same object, and `verify` re-checks that at startup.
 */
export class ToolRegistry {
  constructor(private readonly tools: { readonly [N in ToolName]: RegisteredTool<N> } = TOOLS) {}

  getAllTools(): RegisteredTool[] {
    return TOOL_NAMES.map(name => this.tools[name]);
  }

  get(name: string): RegisteredTool | undefined {
    return isToolName(name) ? this.tools[name] : undefined;
  }

  listTools(): ToolDescriptor[] {
    return this.getAllTools().map(t => ({
      name: t.name,
      description: t.description,
      inputSchema: zodToJsonSchema(t.inputSchema),
    }));
  }

  /** Throws if a table key and its tool name disagree or a key is not a declared tool name. */
  verify(): void {
    const keys = Object.keys(this.tools);
    const declared = new Set<string>(TOOL_NAMES);
    const stray = keys.filter(k => !declared.has(k));
    const mismatched = TOOL_NAMES.filter(name => this.tools[name].name !== name);
    if (stray.length > 0 || mismatched.length > 0 || keys.length !== TOOL_NAMES.length) {
      throw new DocsError(DocsErrorCode.INTERNAL_ERROR, 'Tool registry is inconsistent', { stray, mismatched });
    }
  }
}
