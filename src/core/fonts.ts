// core/fonts.ts
// Font discovery and @font-face stylesheet for the print engine

import * as fs from 'fs/promises';
import * as path from 'path';
import { isMissingFile } from './datasource.js';

export const FONT_FAMILY = 'RecordPrintFont';

const FALLBACK_STACK = "'DejaVu Sans', 'Roboto', 'Arial', 'Segoe UI', sans-serif";

const BUNDLED_FONTS = ['DejaVuSans.ttf', 'Roboto-Regular.ttf'];

export interface FontSearchOptions {
  fontsDir: string;
  platform: NodeJS.Platform;
  homeDir: string;
  windowsDir?: string;
  exists?: (filePath: string) => Promise<boolean>;
}

/**
 * Well-known system font locations per platform
 */
export function systemFontCandidates(
  platform: NodeJS.Platform,
  homeDir: string,
  windowsDir = 'C:\\Windows'
): string[] {
  switch (platform) {
    case 'win32': {
      const fontsDir = path.win32.join(windowsDir, 'Fonts');
      return ['DejaVuSans.ttf', 'Roboto-Regular.ttf', 'arial.ttf', 'segoeui.ttf']
        .map(name => path.win32.join(fontsDir, name));
    }
    case 'darwin':
      return [
        '/System/Library/Fonts/Supplemental/DejaVuSans.ttf',
        '/Library/Fonts/DejaVuSans.ttf',
        '/Library/Fonts/Roboto-Regular.ttf',
        '/System/Library/Fonts/Supplemental/Arial.ttf',
      ];
    default:
      return [
        '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
        '/usr/share/fonts/truetype/roboto/hinted/Roboto-Regular.ttf',
        path.posix.join(homeDir, '.local/share/fonts/DejaVuSans.ttf'),
      ];
  }
}

/**
 * First font found in the assets directory, then in system locations
 */
export async function findFontFile(options: FontSearchOptions): Promise<string | undefined> {
  const exists = options.exists ?? fileExists;
  const candidates = [
    ...BUNDLED_FONTS.map(name => path.join(options.fontsDir, name)),
    ...systemFontCandidates(options.platform, options.homeDir, options.windowsDir),
  ];

  for (const candidate of candidates) {
    if (await exists(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

export function buildFontCss(fontUrl?: string): string {
  if (!fontUrl) {
    return `html, body { font-family: ${FALLBACK_STACK}; }`;
  }
  return [
    '@font-face {',
    `  font-family: '${FONT_FAMILY}';`,
    `  src: url('${fontUrl}');`,
    '  font-weight: normal;',
    '  font-style: normal;',
    '}',
    `html, body { font-family: '${FONT_FAMILY}', ${FALLBACK_STACK}; }`,
  ].join('\n');
}

/**
 * Stylesheet with the font embedded as a data URL, since the page
 * is loaded from memory and cannot reach file:// resources.
 */
export async function loadFontCss(fontFile?: string): Promise<string> {
  if (!fontFile) {
    return buildFontCss();
  }
  const data = await fs.readFile(fontFile);
  return buildFontCss(`data:font/ttf;base64,${data.toString('base64')}`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}
