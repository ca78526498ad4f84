/**
 * Small markup/CSS/JS snippet builders used by the generator tools.
 */

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export interface ThemeColors {
  name: string;
  primary: string;
  secondary: string;
  accent: string;
  base: string;
}

// Colours may be hex or functional notation such as oklch(70% 0.2 250 / 0.9).
const unsafeColorChars = /[^\w#%(),./ -]/g;

export function generateTheme(theme: ThemeColors): string {
  const name = theme.name.replace(/[^\w-]/g, '');
  const [primary, secondary, accent, base] = [theme.primary, theme.secondary, theme.accent, theme.base].map(c =>
    c.replace(unsafeColorChars, '')
  );
  return (
    `@plugin "daisyui/theme" { name: "${name}"; ` +
    `--color-primary: ${primary}; --color-secondary: ${secondary}; ` +
    `--color-accent: ${accent}; --color-base-100: ${base}; }`
  );
}

export interface FormField {
  name: string;
  type?: string;
  label?: string;
}

export function scaffoldForm(title: string, fields: FormField[]): string {
  const inputs = fields
    .map(f => {
      const name = escapeHtml(f.name);
      const label = escapeHtml(f.label ?? f.name);
      const type = escapeHtml(f.type ?? 'text');
      return (
        `<div class="form-control"><label class="label"><span class="label-text">${label}</span></label>` +
        `<input type="${type}" name="${name}" class="input input-bordered" /></div>`
      );
    })
    .join('');
  return (
    `<div class="card bg-base-100 w-full max-w-sm shadow-2xl"><form class="card-body">` +
    `<h2 class="card-title justify-center">${escapeHtml(title)}</h2>${inputs}` +
    `<div class="form-control mt-6"><button class="btn btn-primary">Submit</button></div></form></div>`
  );
}

export function createChart(chartType: string, id: string): string {
  const safeId = id.replace(/[^A-Za-z0-9_-]/g, '');
  const safeType = chartType.replace(/[^A-Za-z]/g, '');
  return (
    `<canvas id="${safeId}"></canvas><script>new Chart(document.getElementById('${safeId}'), ` +
    `{ type: '${safeType}', data: { datasets: [{ data: [10, 20] }] } });</script>`
  );
}

export function createTable(columns: string[]): string {
  const headers = columns.map(c => `<th>${escapeHtml(c)}</th>`).join('');
  const cells = columns.length > 0 ? columns.map(() => '<td>Data</td>').join('') : '<td>Data</td>';
  return (
    `<table class="table w-full"><thead><tr>${headers}</tr></thead>` +
    `<tbody><tr>${cells}</tr></tbody></table>`
  );
}

const SCRIPTS: ReadonlyMap<string, string> = new Map([
  ['modal', "document.getElementById('my_modal_1').showModal();"],
  ['drawer', "document.getElementById('my-drawer').checked = !document.getElementById('my-drawer').checked;"],
]);

export function getScript(component: string): string {
  return SCRIPTS.get(component.trim().toLowerCase()) ?? '// No script';
}
