import os from 'os';
import path from 'path';
import fs from 'fs/promises';
import { LAYOUTS, LayoutEngine, isLayoutName, sanitizeTitle } from '../../../src/generators/layouts.js';
import { DocsErrorCode } from '../../../src/shared/errors.js';

describe('sanitizeTitle', () => {
  it('keeps letters, digits, whitespace, dashes and underscores', () => {
    expect(sanitizeTitle('Hello <script>alert(1)</script>')).toBe('Hello scriptalert1script');
    expect(sanitizeTitle('Café_Ops-2')).toBe('Café_Ops-2');
  });

  it('caps the title at 100 characters', () => {
    expect(sanitizeTitle('a'.repeat(150))).toBe('a'.repeat(100));
  });
});

describe('isLayoutName', () => {
  it('accepts only known layouts', () => {
    expect(isLayoutName('kanban')).toBe(true);
    expect(isLayoutName('portal')).toBe(false);
  });
});

describe('LayoutEngine', () => {
  const engine = new LayoutEngine();

  it('lists the ten layouts', () => {
    expect(engine.listLayouts()).toEqual([...LAYOUTS]);
    expect(engine.listLayouts()).toHaveLength(10);
  });

  it('fills every title placeholder with the sanitised title', () => {
    const html = engine.generate('auth', 'Sign <b>Up</b>');
    expect(html).toContain('<h2 class="card-title justify-center text-2xl">Sign bUpb</h2>');
    expect(html).toContain('<button class="btn btn-primary mt-4">Sign bUpb</button>');
    expect(html).not.toContain('{{title}}');
  });

  it('produces a template for every layout', () => {
    for (const layout of LAYOUTS) {
      const html = engine.generate(layout, 'Acme');
      expect(html).toContain('Acme');
      expect(html).not.toContain('{{title}}');
    }
  });

  describe('with a template directory', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'layouts-test-'));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true });
    });

    it('reads templates from the given directory', async () => {
      for (const layout of LAYOUTS) {
        await fs.writeFile(path.join(tmpDir, `${layout}.html`), `<main>${layout}: {{title}}</main>\n`);
      }
      expect(new LayoutEngine(tmpDir).generate('blog', 'News')).toBe('<main>blog: News</main>');
    });

    it('fails when a template is missing', async () => {
      await fs.writeFile(path.join(tmpDir, 'saas.html'), '{{title}}');
      expect(() => new LayoutEngine(tmpDir)).toThrow(
        expect.objectContaining({ code: DocsErrorCode.CORPUS_UNAVAILABLE })
      );
    });
  });
});
