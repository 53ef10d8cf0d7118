import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  LAYOUT_SCAN_LINES,
  LayoutResolver,
  findLayoutDirective,
  parseLayoutDirective,
} from './layout.js';
import { logger } from './logger.js';

describe('parseLayoutDirective', () => {
  it('reads the layout path', () => {
    expect(parseLayoutDirective('<!-- layout: components/layouts/main.html -->')).toBe(
      'components/layouts/main.html'
    );
    expect(parseLayoutDirective('   <!--layout:base.html-->  ')).toBe('base.html');
  });

  it('ignores other comments and empty directives', () => {
    expect(parseLayoutDirective('<!-- main layout -->')).toBeNull();
    expect(parseLayoutDirective('<!-- layout: -->')).toBeNull();
    expect(parseLayoutDirective('<p>layout: x</p>')).toBeNull();
  });
});

describe('findLayoutDirective', () => {
  it('returns the line index of the directive', () => {
    const source = '<h1>{{title}}</h1>\n<!-- layout: main.html -->\n<p></p>';
    expect(findLayoutDirective(source)).toEqual({ index: 1, layout: 'main.html' });
  });

  it(`only searches the first ${LAYOUT_SCAN_LINES} lines`, () => {
    const filler = Array.from({ length: LAYOUT_SCAN_LINES }, () => '<p></p>').join('\n');
    expect(findLayoutDirective(`${filler}\n<!-- layout: late.html -->`)).toBeNull();
  });
});

describe('LayoutResolver', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tessel-layout-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('resolves the layout against the site root', async () => {
    const page = path.join(root, 'page.html');
    fs.writeFileSync(page, '<!-- layout: components/layouts/main.html -->\n<p>hi</p>');

    const resolver = new LayoutResolver(root);
    expect(await resolver.resolve(page)).toBe(path.join(root, 'components/layouts/main.html'));
  });

  it('returns null for pages without a directive', async () => {
    const page = path.join(root, 'page.html');
    fs.writeFileSync(page, '<p>hi</p>');
    expect(await new LayoutResolver(root).resolve(page)).toBeNull();
  });

  it('rescans when the page changes', async () => {
    const page = path.join(root, 'page.html');
    fs.writeFileSync(page, '<!-- layout: a.html -->');
    const resolver = new LayoutResolver(root);
    expect(await resolver.resolve(page)).toBe(path.join(root, 'a.html'));

    fs.writeFileSync(page, '<!-- layout: b.html -->');
    const later = new Date(Date.now() + 5_000);
    fs.utimesSync(page, later, later);
    expect(await resolver.resolve(page)).toBe(path.join(root, 'b.html'));
  });

  it('treats an unreadable page as having no layout', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => {});
    const missing = path.join(root, 'missing.html');

    expect(await new LayoutResolver(root).resolve(missing)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
