// test/unit/options.test.ts
import * as os from 'node:os';
import * as path from 'node:path';

import fs from 'fs-extra';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { ansiEnabled, resolveRecorderOptions } from '../../suite/components/options.ts';
import { BUILTIN_COLORS, mergeTagColors } from '../../suite/components/tag-colors.ts';

describe('ansiEnabled', () => {
  it.each([
    [{ TERM: 'xterm' }, true, true],
    [{ TERM: 'xterm' }, false, false],
    [{}, true, false],
    [{ TERM: 'dumb' }, true, false],
    [{ TERM: 'xterm', NO_COLOR: '1' }, true, false],
    [{ NO_COLOR: '1', FORCE_COLOR: '1' }, true, false],
    [{ FORCE_COLOR: '1' }, false, true],
    [{ TERM: 'xterm', FORCE_COLOR: '0' }, true, false],
  ])('%j tty=%s → %s', (env, isTTY, expected) => {
    expect(ansiEnabled(env, isTTY)).toBe(expected);
  });
});

describe('resolveRecorderOptions', () => {
  let dir: string;
  let tagFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recorder-options-'));
    tagFile = path.join(dir, 'tag-colors.json');
  });

  afterEach(() => {
    fs.removeSync(dir);
  });

  it('enables 256 colors for 256-color terminals', () => {
    const { options, warnings } = resolveRecorderOptions({
      env: { TERM: 'xterm-256color', EVENT_RECORDER_TAG_COLORS: tagFile },
      stream: { isTTY: true },
      platform: 'linux',
    });

    expect(options).toMatchObject({
      useANSIEscapeCodes: true,
      use256ColorANSIEscapeCodes: true,
      useIconGlyphs: false,
      platform: 'linux',
    });
    expect(warnings).toEqual([]);
  });

  it('never claims 256 colors without ANSI', () => {
    const { options } = resolveRecorderOptions({
      env: { COLORTERM: 'truecolor', EVENT_RECORDER_TAG_COLORS: tagFile },
      stream: { isTTY: false },
    });
    expect(options.use256ColorANSIEscapeCodes).toBe(false);
  });

  it('reads the icon glyph flag', () => {
    const { options } = resolveRecorderOptions({
      env: { EVENT_RECORDER_ICON_GLYPHS: '1', EVENT_RECORDER_TAG_COLORS: tagFile },
    });
    expect(options.useIconGlyphs).toBe(true);
  });

  it('puts code overrides ahead of the tag colors file', () => {
    fs.writeJsonSync(tagFile, { db: '#336699', ui: 'orange' });
    const { options } = resolveRecorderOptions({
      env: { EVENT_RECORDER_TAG_COLORS: tagFile },
      tagColors: [new Map([['db', BUILTIN_COLORS.green]])],
    });

    const merged = mergeTagColors(options.tagColors);
    expect(merged.get('db')).toBe(BUILTIN_COLORS.green);
    expect(merged.get('ui')).toBe(BUILTIN_COLORS.orange);
  });

  it('turns a broken tag colors file into a warning', () => {
    fs.writeJsonSync(tagFile, { db: 42 });
    const { options, warnings } = resolveRecorderOptions({ env: { EVENT_RECORDER_TAG_COLORS: tagFile } });

    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^Ignoring tag colors\. .*tag-colors\.json: invalid tag colors at "db"/);
    expect(options.tagColors).toEqual([]);
  });
});
