import { access } from 'fs/promises';
import chalk from 'chalk';
import Table from 'cli-table3';
import type { BackgroundKind, Config, Logger } from '@threadcast/shared';
import { backgroundPath, loadBackgroundCatalog } from '@threadcast/background';
import { loadThreadDocument } from './document.js';
import { JOB_NAMES } from './jobs.js';
import { createNarrateProcessor, type ThreadPipeline } from './pipeline.js';
import type { QueueManager } from './queue.js';

export type QueueClient = Pick<QueueManager, 'addJob' | 'registerProcessor' | 'getHealth' | 'getJobHistory' | 'shutdown'>;

export interface CliContext {
  config: Config;
  logger: Logger;
  /** Receives every printed line. */
  out: (line: string) => void;
  pipeline: () => Promise<Pick<ThreadPipeline, 'run'>>;
  queue: () => QueueClient;
  /** Resolves when the worker should stop. */
  untilShutdown: () => Promise<void>;
  catalogDir?: string;
}

/** Run one CLI command. Resolves with the process exit code. */
export async function runCommand(command: string | undefined, args: string[], ctx: CliContext): Promise<number> {
  const { config, out } = ctx;

  const print = {
    header: (text: string) => out('\n' + chalk.bold.cyan(`  ${text}`)),
    success: (text: string) => out(chalk.green(`  ✓ ${text}`)),
    info: (text: string) => out(chalk.blue(`  ℹ ${text}`)),
    warn: (text: string) => out(chalk.yellow(`  ⚠ ${text}`)),
    error: (text: string) => out(chalk.red(`  ✗ ${text}`)),
    dim: (text: string) => out(chalk.dim(`    ${text}`)),
  };

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      out(HELP);
      return 0;

    case 'run': {
      const file = args[0];
      if (!file) {
        print.error('Usage: threadcast run <thread.json>');
        return 1;
      }
      const document = await loadThreadDocument(file);
      print.header(`Narrating "${document.title}"`);

      const pipeline = await ctx.pipeline();
      const result = await pipeline.run(document);
      const { narration, background } = result;

      const table = new Table();
      table.push(
        { [chalk.cyan('Document')]: result.documentId },
        { [chalk.cyan('Narration')]: `${narration.totalDuration.toFixed(2)}s` },
        { [chalk.cyan('Background')]: `${result.duration}s` },
        { [chalk.cyan(config.storyMode ? 'Story parts' : 'Comments')]: String(narration.commentCount) },
        { [chalk.cyan('Clips')]: String(narration.segments.length) },
        { [chalk.cyan('Video')]: background.video.path },
        { [chalk.cyan('Audio')]: background.audio ? background.audio.path : 'disabled' },
      );
      out(table.toString());

      if (background.audio?.placeholder) print.warn('Background audio replaced with silence');
      if (background.video.window.degraded) print.warn('Background video is shorter than the narration');
      print.success(`Background video by ${background.credit}`);
      return 0;
    }

    case 'enqueue': {
      const file = args[0];
      if (!file) {
        print.error('Usage: threadcast enqueue <thread.json>');
        return 1;
      }
      const document = await loadThreadDocument(file);
      const qm = ctx.queue();
      try {
        const jobId = await qm.addJob(JOB_NAMES.NARRATE_THREAD, { type: 'narrate-thread', document });
        print.success(`Narration job queued (${chalk.bold(jobId)})`);
        print.dim('Run "threadcast status" to monitor progress');
      } finally {
        await qm.shutdown();
      }
      return 0;
    }

    case 'worker': {
      const pipeline = await ctx.pipeline();
      const qm = ctx.queue();
      qm.registerProcessor(JOB_NAMES.NARRATE_THREAD, createNarrateProcessor(pipeline));
      print.header('Narration worker');
      print.success(`Waiting for jobs (concurrency ${config.workerConcurrency})`);
      print.dim('Press Ctrl+C to stop');

      await ctx.untilShutdown();
      await qm.shutdown();
      return 0;
    }

    case 'status': {
      print.header('Queue Health');
      const qm = ctx.queue();
      try {
        const health = await qm.getHealth();
        const table = new Table();
        table.push(
          { [chalk.cyan('Waiting')]: chalk.yellow(health.waiting.toString()) },
          { [chalk.cyan('Active')]: chalk.blue(health.active.toString()) },
          { [chalk.cyan('Completed')]: chalk.green(health.completed.toString()) },
          { [chalk.cyan('Failed')]: health.failed > 0 ? chalk.red(health.failed.toString()) : '0' },
          { [chalk.cyan('Delayed')]: health.delayed.toString() },
        );
        out(table.toString());

        const jobs = await qm.getJobHistory(10);
        if (jobs.length > 0) {
          print.header('Recent Jobs');
          const history = new Table({
            head: [chalk.cyan('ID'), chalk.cyan('Thread'), chalk.cyan('Status'), chalk.cyan('Time')],
            colWidths: [12, 24, 12, 22],
          });

          for (const job of jobs) {
            const statusColor =
              job.state === 'completed'
                ? chalk.green
                : job.state === 'failed'
                  ? chalk.red
                  : job.state === 'active'
                    ? chalk.blue
                    : chalk.yellow;

            history.push([
              job.id.slice(0, 10),
              job.data.document.id.slice(0, 22),
              statusColor(job.state),
              new Date(job.timestamp).toISOString().slice(0, 19),
            ]);
          }
          out(history.toString());
        }
      } finally {
        await qm.shutdown();
      }
      return 0;
    }

    case 'backgrounds': {
      for (const kind of ['video', 'audio'] as const) {
        print.header(kind === 'video' ? 'Background Videos' : 'Background Audio');
        out(await catalogTable(kind, config, ctx.catalogDir));
      }
      print.dim(`Files are looked up under ${config.assetsDir}/backgrounds/<kind>/<credit>-<filename>`);
      return 0;
    }

    default:
      print.error(`Unknown command: ${command}`);
      out(HELP);
      return 1;
  }
}

async function catalogTable(kind: BackgroundKind, config: Config, catalogDir?: string): Promise<string> {
  const catalog = await loadBackgroundCatalog(kind, catalogDir);
  const table = new Table({
    head: [chalk.cyan('Key'), chalk.cyan('Credit'), chalk.cyan('File'), chalk.cyan('Position'), chalk.cyan('Local')],
  });

  for (const source of catalog.values()) {
    const local = await access(backgroundPath(config.assetsDir, kind, source)).then(
      () => true,
      () => false,
    );
    table.push([
      source.key,
      source.credit,
      source.filename,
      source.position.kind === 'center' ? 'center' : `scroll ${source.position.offset}`,
      local ? chalk.green('yes') : chalk.red('missing'),
    ]);
  }
  return table.toString();
}

const HELP = `
  threadcast: narrated thread videos from text threads

  Usage:
    threadcast <command> [options]

  Commands:
    run <thread.json>          Narrate a thread and cut its backgrounds
    enqueue <thread.json>      Queue a thread for a worker
    worker                     Process queued threads
    status                     Show queue health and job history
    backgrounds                List background catalog entries
`;
