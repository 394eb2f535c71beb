import { PrimaryLanguage, Script, ScriptProfile } from '../types/metadata.types';

type Range = readonly [number, number];

const SCRIPT_RANGES: Record<Script, readonly Range[]> = {
  latin: [
    [0x0041, 0x005a],
    [0x0061, 0x007a],
    [0x00c0, 0x00d6],
    [0x00d8, 0x00f6],
    [0x00f8, 0x024f],
    [0x1e00, 0x1eff],
  ],
  han: [
    [0x4e00, 0x9fff],
    [0x3400, 0x4dbf],
    [0x20000, 0x2a6df],
    [0xf900, 0xfaff],
  ],
  kana: [
    [0x3040, 0x309f],
    [0x30a0, 0x30ff],
    [0x31f0, 0x31ff],
    [0xff66, 0xff9f],
  ],
  hangul: [
    [0xac00, 0xd7af],
    [0x1100, 0x11ff],
    [0x3130, 0x318f],
  ],
  arabic: [[0x0600, 0x06ff]],
  cyrillic: [[0x0400, 0x04ff]],
  devanagari: [[0x0900, 0x097f]],
  thai: [[0x0e00, 0x0e7f]],
  hebrew: [[0x0590, 0x05ff]],
  greek: [[0x0370, 0x03ff]],
};

const SCRIPTS: readonly Script[] = [
  'latin',
  'han',
  'kana',
  'hangul',
  'arabic',
  'cyrillic',
  'devanagari',
  'thai',
  'hebrew',
  'greek',
];

// Highest priority first
const LANGUAGE_PRIORITY: ReadonlyArray<[Script, PrimaryLanguage]> = [
  ['kana', 'Japanese'],
  ['han', 'Chinese'],
  ['hangul', 'Korean'],
  ['arabic', 'Arabic'],
  ['cyrillic', 'Russian'],
  ['devanagari', 'Hindi'],
  ['thai', 'Thai'],
  ['hebrew', 'Hebrew'],
  ['greek', 'Greek'],
  ['latin', 'English'],
];

export function scriptOf(codePoint: number): Script | undefined {
  for (const script of SCRIPTS) {
    if (SCRIPT_RANGES[script].some(([low, high]) => codePoint >= low && codePoint <= high)) {
      return script;
    }
  }
  return undefined;
}

export function classify(text: string): ScriptProfile {
  const scripts = new Set<Script>();
  let cjkCount = 0;
  let charCount = 0;

  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined || /\s/.test(char)) continue;
    charCount++;

    const script = scriptOf(codePoint);
    if (!script) continue;
    scripts.add(script);
    if (script === 'han' || script === 'kana') cjkCount++;
  }

  const primary = LANGUAGE_PRIORITY.find(([script]) => scripts.has(script));
  const nonLatin = [...scripts].filter((script) => script !== 'latin');

  return {
    scripts,
    primaryLanguage: primary?.[1],
    bilingual: nonLatin.length > 0 && scripts.has('latin'),
    trilingual: scripts.size >= 3 && scripts.has('latin'),
    cjkCount,
    charCount,
  };
}

export function hasNonLatinScript(text: string): boolean {
  for (const char of text) {
    const codePoint = char.codePointAt(0);
    if (codePoint === undefined) continue;
    const script = scriptOf(codePoint);
    if (script && script !== 'latin') return true;
  }
  return false;
}
