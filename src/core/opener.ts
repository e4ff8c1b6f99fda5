// core/opener.ts
// Open a produced file with the platform's default viewer

import { spawn } from 'child_process';
import { RecordPrintError } from '../types/index.js';

export interface FileOpener {
  open(filePath: string): Promise<void>;
}

export interface OpenCommand {
  command: string;
  args: string[];
}

export function openCommandFor(platform: NodeJS.Platform, filePath: string): OpenCommand {
  switch (platform) {
    case 'win32':
      // `start` treats the first quoted argument as the window title
      return { command: 'cmd', args: ['/c', 'start', '""', filePath] };
    case 'darwin':
      return { command: 'open', args: [filePath] };
    default:
      return { command: 'xdg-open', args: [filePath] };
  }
}

export class SystemFileOpener implements FileOpener {
  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly commandFor: (platform: NodeJS.Platform, filePath: string) => OpenCommand = openCommandFor
  ) {}

  open(filePath: string): Promise<void> {
    const { command, args } = this.commandFor(this.platform, filePath);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        detached: true,
        stdio: 'ignore',
      });

      child.on('error', (error) => {
        reject(new RecordPrintError(
          `Failed to spawn ${command}`,
          filePath,
          error.message
        ));
      });

      child.on('spawn', () => {
        child.unref();
        resolve();
      });
    });
  }
}
