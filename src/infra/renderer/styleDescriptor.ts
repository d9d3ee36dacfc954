/**
 * Style descriptor → chalk.
 *
 * Grammar (space separated, case-insensitive):
 *   modifiers   bold dim italic underline reverse strike hidden
 *   colours     named colour, `bright_<name>`, `#rrggbb`, `grey0`..`grey100`
 *   background  `on <colour>`
 *   `not <modifier>`, `blink` and other unknown words are ignored.
 */

import type { BackgroundColorName, ChalkInstance, ForegroundColorName, ModifierName } from 'chalk';

const MODIFIERS: Readonly<Record<string, ModifierName>> = {
  bold: 'bold',
  b: 'bold',
  dim: 'dim',
  d: 'dim',
  italic: 'italic',
  i: 'italic',
  underline: 'underline',
  u: 'underline',
  reverse: 'inverse',
  r: 'inverse',
  strike: 'strikethrough',
  s: 'strikethrough',
  hidden: 'hidden',
  conceal: 'hidden',
};

interface AnsiColor {
  fg: ForegroundColorName;
  bg: BackgroundColorName;
}

const ANSI_COLORS: Readonly<Record<string, AnsiColor>> = {
  black: { fg: 'black', bg: 'bgBlack' },
  red: { fg: 'red', bg: 'bgRed' },
  green: { fg: 'green', bg: 'bgGreen' },
  yellow: { fg: 'yellow', bg: 'bgYellow' },
  blue: { fg: 'blue', bg: 'bgBlue' },
  magenta: { fg: 'magenta', bg: 'bgMagenta' },
  cyan: { fg: 'cyan', bg: 'bgCyan' },
  white: { fg: 'white', bg: 'bgWhite' },
  gray: { fg: 'gray', bg: 'bgGray' },
  grey: { fg: 'grey', bg: 'bgGrey' },
  bright_black: { fg: 'blackBright', bg: 'bgBlackBright' },
  bright_red: { fg: 'redBright', bg: 'bgRedBright' },
  bright_green: { fg: 'greenBright', bg: 'bgGreenBright' },
  bright_yellow: { fg: 'yellowBright', bg: 'bgYellowBright' },
  bright_blue: { fg: 'blueBright', bg: 'bgBlueBright' },
  bright_magenta: { fg: 'magentaBright', bg: 'bgMagentaBright' },
  bright_cyan: { fg: 'cyanBright', bg: 'bgCyanBright' },
  bright_white: { fg: 'whiteBright', bg: 'bgWhiteBright' },
};

/** Named colours outside the 16-colour palette, as hex */
const EXTENDED_COLORS: Readonly<Record<string, string>> = {
  purple: '#af00ff',
  orange: '#ff8700',
  dark_orange: '#ff8700',
  pink: '#ff87af',
  gold: '#ffd700',
  navy_blue: '#00005f',
  dark_green: '#005f00',
  dark_red: '#870000',
  dark_cyan: '#00af87',
  dark_magenta: '#8700af',
  sky_blue: '#87d7ff',
  deep_sky_blue: '#00afff',
  orchid: '#d75fd7',
  violet: '#d787ff',
  turquoise: '#00d7af',
};

const HEX_PATTERN = /^#[0-9a-f]{6}$/;
const GREY_PATTERN = /^gr[ae]y(\d{1,3})$/;

type ColorRef = { kind: 'ansi'; color: AnsiColor } | { kind: 'hex'; hex: string };

function parseColor(word: string): ColorRef | null {
  const ansi = ANSI_COLORS[word];
  if (ansi) return { kind: 'ansi', color: ansi };

  const extended = EXTENDED_COLORS[word];
  if (extended) return { kind: 'hex', hex: extended };

  if (HEX_PATTERN.test(word)) return { kind: 'hex', hex: word };

  const grey = GREY_PATTERN.exec(word);
  if (grey?.[1]) {
    const level = Math.min(100, Number(grey[1]));
    const channel = Math.round((level / 100) * 255).toString(16).padStart(2, '0');
    return { kind: 'hex', hex: `#${channel}${channel}${channel}` };
  }
  return null;
}

function applyForeground(chalk: ChalkInstance, color: ColorRef): ChalkInstance {
  return color.kind === 'ansi' ? chalk[color.color.fg] : chalk.hex(color.hex);
}

function applyBackground(chalk: ChalkInstance, color: ColorRef): ChalkInstance {
  return color.kind === 'ansi' ? chalk[color.color.bg] : chalk.bgHex(color.hex);
}

/** Build a chalk instance for a descriptor; unknown words are ignored */
export function chalkForDescriptor(base: ChalkInstance, descriptor: string): ChalkInstance {
  const words = descriptor.trim().toLowerCase().split(/\s+/).filter(Boolean);
  let styled = base;
  for (let i = 0; i < words.length; i++) {
    const word = words[i] ?? '';

    if (word === 'not') {
      i++;
      continue;
    }
    if (word === 'on') {
      const next = words[i + 1];
      const color = next ? parseColor(next) : null;
      if (color) {
        styled = applyBackground(styled, color);
      }
      i++;
      continue;
    }

    const modifier = MODIFIERS[word];
    if (modifier) {
      styled = styled[modifier];
      continue;
    }

    const color = parseColor(word);
    if (color) {
      styled = applyForeground(styled, color);
    }
  }
  return styled;
}

/** Apply a descriptor to text; an absent or empty descriptor leaves it plain */
export function applyStyle(base: ChalkInstance, text: string, descriptor?: string): string {
  if (!descriptor || !text) {
    return text;
  }
  return chalkForDescriptor(base, descriptor)(text);
}
