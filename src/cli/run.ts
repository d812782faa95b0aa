import { readFile, writeFile } from 'node:fs/promises';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import { createBrowserHost } from '../browser/resource.js';
import { createBrowserPerformer } from '../browser/performer.js';
import type { ActionPerformer } from '../browser/performer.js';
import { EXIT_CODES, README_GENERATION } from '../config/defaults.js';
import { loadWorkflowFile } from '../config/loader.js';
import { generateReadme } from '../docs/readme.js';
import { resolveTemplate } from '../docs/template.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { generateJSON, generateMarkdown, serializeJSON } from '../report/reporter.js';
import { categoryDataSchema } from '../schema/inputs.js';
import type { Workflow } from '../schema/workflow.js';
import { WorkflowContext } from '../workflow/context.js';
import { runWorkflow } from '../workflow/runner.js';
import type { WorkflowResult } from '../workflow/runner.js';
import * as log from '../utils/logger.js';

// ── Option parsing ───────────────────────────────────────────

/** Accumulate repeatable `--var key=value` flags. */
export function collectVar(
  raw: string,
  previous: Record<string, string>,
): Record<string, string> {
  const eqIndex = raw.indexOf('=');
  if (eqIndex <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${raw}"`);
  }
  return {
    ...previous,
    [raw.slice(0, eqIndex).trim()]: raw.slice(eqIndex + 1),
  };
}

function parseSeconds(raw: string): number {
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError(`Expected a positive number of seconds, got "${raw}"`);
  }
  return seconds;
}

// ── LLM client (created on first use) ────────────────────────

function lazyLLMClient(): () => LLMClient {
  let client: LLMClient | null = null;
  return () => {
    client ??= createLLMClient(loadLLMConfig());
    return client;
  };
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(result: WorkflowResult): void {
  const passed = result.steps.filter((s) => s.ok).length;
  const failed = result.steps.length - passed;

  process.stderr.write(`\n--- pageline result ---\n`);
  process.stderr.write(`Workflow: ${result.name}\n`);
  process.stderr.write(`Result:   ${result.ok ? 'OK' : 'FAILED'}\n`);
  process.stderr.write(
    `Steps:    ${String(passed)} ok, ${String(failed)} failed\n\n`,
  );
}

// ── Browser teardown ─────────────────────────────────────────

async function closeBrowser(performer: ActionPerformer): Promise<void> {
  try {
    await performer.perform({ type: 'close', continueOnError: false }, {});
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`Closing the browser failed: ${message}`);
  }
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run a workflow file against one serialized browser session')
    .argument('<workflow>', 'Path to a workflow file (YAML or JSON)')
    .option('--headless', 'Run the browser headless')
    .option('--var <key=value>', 'Set a workflow variable (repeatable)', collectVar, {})
    .option('--wait-timeout <seconds>', 'Give up waiting on a browser step after this long', parseSeconds)
    .option('--json', 'Output JSON to stdout')
    .option('--report <path>', 'Write a markdown report to this file')
    .action(
      async (
        workflowPath: string,
        opts: {
          headless?: true;
          var: Record<string, string>;
          waitTimeout?: number;
          json?: true;
          report?: string;
        },
      ) => {
        let workflow: Workflow;
        try {
          workflow = await loadWorkflowFile(workflowPath);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Config error: ${message}\n`);
          process.exitCode = EXIT_CODES.CONFIG_ERROR;
          return;
        }

        // CLI flags override the workflow file
        const headless = opts.headless ?? workflow.headless;
        const waitTimeout = opts.waitTimeout ?? workflow.waitTimeout;
        const context = new WorkflowContext({ ...workflow.vars, ...opts.var });

        const host = createBrowserHost();
        let performer: ActionPerformer | null = null;

        try {
          const dispatcher = await host.getOrCreate();
          performer = createBrowserPerformer(dispatcher, {
            headless,
            waitTimeoutMs: waitTimeout !== undefined ? waitTimeout * 1000 : undefined,
          });

          const result = await runWorkflow(
            workflow,
            { performer, llm: lazyLLMClient() },
            context,
          );
          const exitCode = result.ok ? EXIT_CODES.OK : EXIT_CODES.STEP_FAILED;

          if (opts.report !== undefined) {
            await writeFile(opts.report, generateMarkdown(result), 'utf-8');
          }
          if (opts.json) {
            process.stdout.write(serializeJSON(generateJSON(result, exitCode)) + '\n');
          }

          printSummary(result);
          process.exitCode = exitCode;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Error: ${message}\n`);
          process.exitCode = EXIT_CODES.CONFIG_ERROR;
        } finally {
          if (performer) {
            await closeBrowser(performer);
          }
        }
      },
    );
}

export function registerReadmeCommand(program: Command): void {
  program
    .command('readme')
    .description('Draft a README from a category data JSON file')
    .argument('<input>', 'JSON with category_info, readme_template, screenshot_links')
    .option('--out <path>', 'Where to save the README', README_GENERATION.OUTPUT_FILE)
    .action(async (inputPath: string, opts: { out: string }) => {
      try {
        const raw = await readFile(inputPath, 'utf-8');
        const data = categoryDataSchema.parse(JSON.parse(raw));

        const template = await resolveTemplate(data.readme_template);
        const readme = await generateReadme(createLLMClient(loadLLMConfig()), {
          categoryInfo: data.category_info,
          template,
          screenshotLinks: data.screenshot_links,
        });

        await writeFile(opts.out, readme, 'utf-8');
        log.info(`README saved to ${opts.out}`);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = EXIT_CODES.CONFIG_ERROR;
      }
    });
}
