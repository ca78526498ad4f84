import { parseCorpus } from '../../../src/corpus/parser.js';

const SAMPLE = '### Btn\nUse the btn class.\n### Card\nUse the card class for containers.\n';

describe('parseCorpus', () => {
  it('splits entries on headings and keeps the heading as the first body line', () => {
    const store = parseCorpus(SAMPLE);
    expect(Array.from(store.entries.keys())).toEqual(['btn', 'card']);
    expect(store.entries.get('btn')?.body).toBe('### Btn\nUse the btn class.');
    expect(store.entries.get('card')?.body).toBe('### Card\nUse the card class for containers.');
  });

  it('indexes tokens of five or more characters for every entry', () => {
    const store = parseCorpus(SAMPLE);
    expect(store.index.get('class')).toEqual(['btn', 'card']);
    expect(store.index.get('containers')).toEqual(['card']);
    expect(store.index.has('btn')).toBe(false);
  });

  it('discards lines before the first heading', () => {
    const store = parseCorpus('intro text\nmore intro\n### Alert\nbody');
    expect(Array.from(store.entries.keys())).toEqual(['alert']);
    expect(store.entries.get('alert')?.body).toBe('### Alert\nbody');
  });

  it('normalises keys by trimming and lowercasing', () => {
    const store = parseCorpus('###   Chat Bubble  \ntext');
    expect(store.entries.has('chat bubble')).toBe(true);
  });

  it('keeps the later body for duplicate headings by default', () => {
    const store = parseCorpus('### Button\nfirst\n### Button\nsecond');
    expect(store.entries.size).toBe(1);
    expect(store.entries.get('button')?.body).toBe('### Button\nsecond');
    expect(store.duplicates).toEqual(['button']);
  });

  it('keeps the earlier body under first-wins', () => {
    const store = parseCorpus('### Button\nfirst\n### button\nsecond', { duplicatePolicy: 'first-wins' });
    expect(store.entries.get('button')?.body).toBe('### Button\nfirst');
    expect(store.duplicates).toEqual(['button']);
  });

  it('derives the index from surviving bodies only', () => {
    const store = parseCorpus('### Alpha\nunique words\n### Alpha\nother stuff');
    expect(store.index.has('unique')).toBe(false);
    expect(store.index.get('other')).toEqual(['alpha']);
    expect(store.index.get('alpha')).toEqual(['alpha']);
  });

  it('records one key per token occurrence', () => {
    const store = parseCorpus('### Grid\nlayout grid layout');
    expect(store.index.get('layout')).toEqual(['grid', 'grid']);
  });

  it('ignores headings with a blank name and the lines under them', () => {
    const store = parseCorpus('### \norphan text\n### Real\nbody');
    expect(Array.from(store.entries.keys())).toEqual(['real']);
    expect(store.index.has('orphan')).toBe(false);
  });

  it('strips carriage returns from CRLF input', () => {
    const store = parseCorpus('### Tab\r\nline one\r\n');
    expect(store.entries.get('tab')?.body).toBe('### Tab\nline one');
  });

  it('honours a custom heading marker', () => {
    const store = parseCorpus('## Menu\nlinks\n### not a heading', { headingMarker: '## ' });
    expect(Array.from(store.entries.keys())).toEqual(['menu']);
    expect(store.entries.get('menu')?.body).toBe('## Menu\nlinks\n### not a heading');
  });

  it('returns an empty store for a corpus without headings', () => {
    const store = parseCorpus('just text\n');
    expect(store.entries.size).toBe(0);
    expect(store.index.size).toBe(0);
  });
});
