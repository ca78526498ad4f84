/**
 * Design concepts — short recipes mapping a visual style to DaisyUI/Tailwind classes.
 */

export interface DesignConcept {
  name: string;
  description: string;
  classes: string[];
  suggestion: string;
  snippet: string;
}

const CONCEPTS: Record<string, DesignConcept> = {
  glassmorphism: {
    name: 'Glassmorphism',
    description: 'Frosted glass aesthetic with transparency and blur effects',
    classes: ['glass', 'backdrop-blur'],
    suggestion: 'Apply glass class to cards and modals for depth',
    snippet: '<div class="card glass w-96 shadow-xl"><div class="card-body">Content</div></div>',
  },
  neumorphism: {
    name: 'Neumorphism',
    description: 'Soft shadows creating extruded surface effect',
    classes: ['shadow-lg', 'bg-base-200'],
    suggestion: 'Combine soft shadows with subtle gradients',
    snippet: '<button class="btn shadow-lg bg-base-200">Button</button>',
  },
  darkmode: {
    name: 'Dark Mode',
    description: 'Dark color scheme with high contrast',
    classes: ['bg-base-100', 'text-base-content'],
    suggestion: 'Use data-theme attribute to toggle themes',
    snippet: '<html data-theme="dark"><body class="bg-base-100 text-base-content">Content</body></html>',
  },
  gradient: {
    name: 'Gradients',
    description: 'Color transitions for visual depth',
    classes: ['bg-gradient-to-r', 'from-primary', 'to-secondary'],
    suggestion: 'Use gradients sparingly on hero sections and CTAs',
    snippet: '<div class="bg-gradient-to-r from-primary to-secondary p-8">Hero</div>',
  },
  skeleton: {
    name: 'Skeleton Loading',
    description: 'Placeholder UI while content loads',
    classes: ['skeleton'],
    suggestion: 'Use skeleton class on elements for loading state',
    snippet: '<div class="skeleton h-32 w-full"></div>',
  },
  responsive: {
    name: 'Responsive Design',
    description: 'Adapts layout to different screen sizes',
    classes: ['sm:', 'md:', 'lg:', 'xl:'],
    suggestion: 'Use responsive prefixes for breakpoint-specific styles',
    snippet: '<div class="grid grid-cols-1 md:grid-cols-2 lg:grid-cols-3 gap-4">...</div>',
  },
};

export class ConceptCatalog {
  private readonly concepts: ReadonlyMap<string, DesignConcept>;

  constructor(concepts: Record<string, DesignConcept> = CONCEPTS) {
    this.concepts = new Map(Object.entries(concepts));
  }

  getConcept(query: string): DesignConcept | undefined {
    const key = query.trim().toLowerCase();
    if (!key) return undefined;
    return this.concepts.get(key);
  }

  listConcepts(): string[] {
    return Array.from(this.concepts.keys()).sort();
  }
}

export function renderConcept(concept: DesignConcept): string {
  return [
    `## ${concept.name}`,
    '',
    `**Description:** ${concept.description}`,
    '',
    `**Classes:** ${concept.classes.join(', ')}`,
    '',
    `**Suggestion:** ${concept.suggestion}`,
    '',
    '```html',
    concept.snippet,
    '```',
  ].join('\n');
}
