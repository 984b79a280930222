import { spawn } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ContentTransform, ToolInvocation, TransformResult } from '../types';
import { describeError } from './errors';
import { Logger, defaultLogger } from './logger';

/**
 * Runs an optimiser binary over a temp copy of the content.
 * The tool edits the file in place; whatever it leaves behind is the output.
 */
export class ExternalTransform implements ContentTransform {
  private logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  async invoke(input: Buffer, tool: ToolInvocation): Promise<TransformResult> {
    let dir: string | undefined;
    try {
      dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 's3-tidy-'));
      const file = path.join(dir, `content${tool.suffix}`);
      await fs.promises.writeFile(file, input);

      const args = [...tool.args, file];
      this.logger.debug(`[transform] ${tool.command} ${args.join(' ')}`);
      const failure = await runTool(tool.command, args);
      if (failure) {
        return { ok: false, reason: failure };
      }

      const output = await fs.promises.readFile(file);
      if (output.length === 0) {
        return { ok: false, reason: `${tool.command} produced empty output` };
      }
      return { ok: true, output };
    } catch (error) {
      return { ok: false, reason: `${tool.command}: ${describeError(error)}` };
    } finally {
      if (dir) {
        await fs.promises.rm(dir, { recursive: true, force: true }).catch((error: unknown) => {
          this.logger.warn(`[transform] Failed to remove ${dir}: ${describeError(error)}`);
        });
      }
    }
  }
}

/**
 * Resolves to undefined on success, or a description of the failure
 */
function runTool(command: string, args: string[]): Promise<string | undefined> {
  return new Promise((resolve) => {
    const child = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    let stderr = '';

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr += chunk.toString('utf-8');
    });

    child.on('error', (err) => {
      resolve(`failed to launch ${command}: ${err.message}`);
    });

    child.on('close', (code) => {
      if (code === 0) {
        resolve(undefined);
        return;
      }
      const detail = stderr.trim();
      resolve(`${command} exited with code ${code ?? 'unknown'}${detail ? `: ${detail}` : ''}`);
    });
  });
}
