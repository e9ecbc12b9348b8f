#!/usr/bin/env node
import dotenv from 'dotenv';
import { createInterface } from 'node:readline/promises';
import { loadConfig, type AppConfig } from './lib/config.js';
import { isMainModule } from './lib/entrypoint.js';
import { errorMessage, isResumeError } from './lib/errors.js';
import { createProvider } from './lib/llm.js';
import logger from './lib/logger.js';
import { ResumePipeline } from './resume/pipeline.js';

export interface Prompter {
  ask(question: string): Promise<string>;
  print(line: string): void;
  close(): void;
}

export function createConsolePrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: (question) => rl.question(question),
    print: (line) => {
      process.stdout.write(`${line}\n`);
    },
    close: () => rl.close(),
  };
}

/**
 * Prompt → generate → save, repeated until the user declines. A failed run
 * is reported and the loop continues.
 */
export async function runInteractive(
  pipeline: ResumePipeline,
  config: Pick<AppConfig, 'defaultIndustry' | 'defaultSeniority'>,
  io: Prompter,
): Promise<void> {
  for (;;) {
    const jobTitle = (await io.ask('Enter target job title: ')).trim();
    if (!jobTitle) continue;
    const industry = await io.ask(`Enter industry [${config.defaultIndustry}]: `);
    const seniority = await io.ask(`Enter seniority level [${config.defaultSeniority}]: `);

    io.print('Generating content...');
    try {
      const result = await pipeline.generateAndSave(
        pipeline.withDefaults({ jobTitle, industry, seniority }),
        {
          onStage: (stage) => {
            if (stage === 'rendering') io.print('Creating document...');
          },
        },
      );
      io.print(`✓ Saved: ${result.path}`);
    } catch (err) {
      io.print(`✗ Error: ${errorMessage(err)}`);
    }

    const again = await io.ask('\nGenerate another? (y/n): ');
    if (again.trim().toLowerCase() !== 'y') break;
  }
}

/**
 * CLI entry. Returns the process exit code; a missing credential returns 1
 * before any provider is created.
 */
export async function main(env: NodeJS.ProcessEnv = process.env, io?: Prompter): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (!isResumeError(err, 'configuration')) throw err;
    logger.fatal({ field: err.field }, err.message);
    return 1;
  }

  const pipeline = new ResumePipeline(config, createProvider(config));
  const prompter = io ?? createConsolePrompter();
  try {
    await runInteractive(pipeline, config, prompter);
  } finally {
    prompter.close();
  }
  return 0;
}

if (isMainModule(import.meta.url)) {
  dotenv.config();
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      logger.fatal({ err }, 'Resume CLI crashed');
      process.exitCode = 1;
    },
  );
}
