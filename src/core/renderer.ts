// core/renderer.ts
// HTML to PDF through headless Chromium (puppeteer-core)

import * as fs from 'fs/promises';
import puppeteer from 'puppeteer-core';
import type { Browser, PDFOptions } from 'puppeteer-core';
import type { GeneratorConfig } from '../types/index.js';
import { RenderError } from '../types/index.js';

export interface RenderOptions {
  stylesheets?: string[];
}

/**
 * Turns HTML markup into PDF bytes
 */
export interface Renderer {
  render(markup: string, options?: RenderOptions): Promise<Uint8Array>;
}

export interface PuppeteerRendererOptions {
  executablePath?: string;
  args: string[];
  pdf: GeneratorConfig['pdf'];
  warn?: (line: string) => void;
}

export interface Closable {
  close(): Promise<void>;
}

/**
 * Common Chromium locations, tried when no executable is configured
 */
export function defaultBrowserPaths(platform: NodeJS.Platform): string[] {
  switch (platform) {
    case 'win32':
      return [
        'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
        'C:\\Program Files (x86)\\Microsoft\\Edge\\Application\\msedge.exe',
      ];
    case 'darwin':
      return [
        '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
        '/Applications/Chromium.app/Contents/MacOS/Chromium',
      ];
    default:
      return [
        '/usr/bin/chromium',
        '/usr/bin/chromium-browser',
        '/usr/bin/google-chrome',
        '/usr/bin/google-chrome-stable',
      ];
  }
}

export function buildPdfOptions(pdf: GeneratorConfig['pdf']): PDFOptions {
  return {
    format: pdf.format,
    printBackground: pdf.printBackground,
    margin: { ...pdf.margin },
  };
}

export class PuppeteerRenderer implements Renderer {
  constructor(
    private readonly options: PuppeteerRendererOptions,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  async render(markup: string, options: RenderOptions = {}): Promise<Uint8Array> {
    const executablePath = await this.findExecutable();

    let browser: Browser;
    try {
      browser = await puppeteer.launch({
        executablePath,
        headless: true,
        args: this.options.args,
      });
    } catch (error) {
      throw new RenderError(
        `Failed to launch browser: ${errorMessage(error)}`,
        'BROWSER_LAUNCH_FAILED',
        error
      );
    }

    return closeAfter(browser, async () => {
      try {
        const page = await browser.newPage();
        await page.setContent(markup, { waitUntil: 'load' });
        for (const css of options.stylesheets ?? []) {
          await page.addStyleTag({ content: css });
        }
        await page.emulateMediaType('print');
        await page.evaluateHandle('document.fonts.ready');

        const pdf = await page.pdf(buildPdfOptions(this.options.pdf));
        return new Uint8Array(pdf);
      } catch (error) {
        throw new RenderError(`PDF rendering failed: ${errorMessage(error)}`, 'RENDER_FAILED', error);
      }
    }, this.options.warn);
  }

  private async findExecutable(): Promise<string> {
    const candidates = this.options.executablePath
      ? [this.options.executablePath]
      : defaultBrowserPaths(this.platform);

    for (const candidate of candidates) {
      if (await isAccessible(candidate)) {
        return candidate;
      }
    }

    throw new RenderError(
      `Chromium executable not found: ${candidates.join(', ')}`,
      'BROWSER_NOT_FOUND'
    );
  }
}

/**
 * Run work against an open browser and close it afterwards. A failure
 * while closing is reported as a RenderError only when the work itself
 * succeeded; otherwise the work's error is kept and the close failure warned.
 */
export async function closeAfter<T>(
  browser: Closable,
  work: () => Promise<T>,
  warn: (line: string) => void = (line: string) => console.warn(line)
): Promise<T> {
  let result: T;
  try {
    result = await work();
  } catch (error) {
    await browser.close().catch((closeError: unknown) => {
      warn(`Browser did not close cleanly: ${errorMessage(closeError)}`);
    });
    throw error;
  }

  try {
    await browser.close();
  } catch (error) {
    throw new RenderError(`Failed to close browser: ${errorMessage(error)}`, 'RENDER_FAILED', error);
  }
  return result;
}

async function isAccessible(filePath: string): Promise<boolean> {
  return fs.access(filePath).then(() => true, () => false);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
