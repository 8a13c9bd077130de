import { Command, InvalidArgumentError } from 'commander';
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { planRoute } from './app/planRoute';
import { simulate } from './app/simulate';
import { PlanError } from './errors';
import type { ProgressFn } from './heuristics';
import { emitCsv } from './io/emitCsv';
import { emitHtml } from './io/emitHtml';
import { emitKml } from './io/emitKml';
import { emitText } from './io/emitText';
import { parseTravelMode } from './io/parse';
import { sendLineMessage } from './providers/line';
import { formatClock, formatDuration, formatTimestampToken } from './time';
import type { TravelMode } from './types';

interface PlanCommandOptions {
  plan: string;
  depart?: string;
  date?: string;
  threshold?: number;
  mode?: TravelMode;
  offline?: boolean;
  fallback: boolean;
  verbose?: boolean;
  progress?: boolean;
  out?: string;
  md?: string | true;
  text?: string | true;
  kml?: string | true;
  csv?: string;
  html?: string | true;
  lineTo?: string;
}

interface SimulateCommandOptions {
  runs?: number;
  stops?: number;
  seed?: number;
  speed?: number;
}

function buildProgressLogger(verbose: boolean): ProgressFn {
  return (phase, tour, length) => {
    const detail = verbose ? ` tour=${tour.join(',')}` : '';
    console.log(`progress ${phase}: stops=${tour.length} length=${length.toFixed(1)}${detail}`);
  };
}

function parseMode(value: string): TravelMode {
  try {
    return parseTravelMode(value);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function parseCount(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer: ${value}`);
  }
  return n;
}

function writeOutput(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
  console.log(`Wrote ${path}`);
}

function reportError(err: unknown): void {
  if (err instanceof PlanError) {
    console.error(`error [${err.code}]: ${err.message}`);
    process.exitCode = 1;
    return;
  }
  throw err;
}

export const program = new Command();

program
  .name('tourplan')
  .description('Plan a visiting order for a set of stops and build a timed itinerary')
  .version('0.1.0')
  .showHelpAfterError();

program
  .command('plan', { isDefault: true })
  .requiredOption('--plan <file>', 'Path to plan JSON file')
  .option('--depart <HH:mm>', 'Departure time from the start')
  .option('--date <YYYY-MM-DD>', 'Reference date for the schedule')
  .option(
    '--threshold <pct>',
    'Prefer the shorter-distance route when it is at most this % slower',
    parseFloat,
  )
  .option('--mode <mode>', 'Travel mode for legs without one (walk, drive, transit)', parseMode)
  .option('--offline', 'Estimate travel times without the routing service')
  .option('--no-fallback', 'Fail instead of estimating when the routing service fails')
  .option('--verbose', 'Print heuristic steps')
  .option('--progress', 'Print heuristic progress')
  .option('--out <file>', 'Write itinerary JSON to this path (overwrite)')
  .option('--md [file]', 'Write the Markdown summary to this path (or stdout)')
  .option('--text [file]', 'Write the text itinerary to this path (or stdout)')
  .option('--kml [file]', 'Write KML to this path (or stdout)')
  .option('--csv <file>', 'Write stops CSV to this path')
  .option('--html [file]', 'Write HTML itinerary to this path (or stdout)')
  .option('--line-to <userId>', 'Send the text itinerary to this LINE user')
  .action(async (opts: PlanCommandOptions) => {
    try {
      const result = await planRoute({
        planPath: opts.plan,
        departure: opts.depart,
        date: opts.date,
        thresholdPct: opts.threshold,
        mode: opts.mode,
        offline: opts.offline,
        fallback: opts.fallback,
        verbose: opts.verbose,
        progress: opts.progress ? buildProgressLogger(Boolean(opts.verbose)) : undefined,
        markdown: opts.md !== undefined,
      });
      const { plan, runTimestamp } = result;
      const tsToken = formatTimestampToken(runTimestamp);
      const tokenize = (s: string): string =>
        s.replace(/\$\{(runId|timestamp)\}/g, (_, k: string) =>
          k === 'runId' ? result.runId ?? '' : tsToken,
        );
      const emitTo = (target: string | true, content: string): void => {
        if (typeof target === 'string') {
          writeOutput(tokenize(target), content);
        } else {
          console.log(content);
        }
      };

      if (opts.out) writeOutput(tokenize(opts.out), result.json);
      if (opts.md !== undefined && result.markdown) emitTo(opts.md, result.markdown);
      if (opts.csv) writeOutput(tokenize(opts.csv), emitCsv(plan, runTimestamp));
      if (opts.kml !== undefined) emitTo(opts.kml, emitKml(plan));
      if (opts.html !== undefined) emitTo(opts.html, emitHtml(plan, runTimestamp));
      const text = emitText(plan);
      if (opts.text !== undefined) emitTo(opts.text, text);

      if (opts.lineTo) {
        const sent = await sendLineMessage(opts.lineTo, text);
        if (!sent.ok) throw sent.error;
        console.log(`Sent itinerary to LINE user ${opts.lineTo}`);
      }

      console.log(result.json);
    } catch (err) {
      reportError(err);
    }
  });

program
  .command('simulate')
  .description('Run random end-to-end plans and check every stop is scheduled')
  .option('--runs <n>', 'Number of random plans', parseCount)
  .option('--stops <n>', 'Stops per plan (default 3-6)', parseCount)
  .option('--seed <seed>', 'Random seed', parseFloat)
  .option('--speed <kmh>', 'Assumed travel speed in km/h', parseFloat)
  .action((opts: SimulateCommandOptions) => {
    try {
      const runs = simulate({
        runs: opts.runs,
        stops: opts.stops,
        seed: opts.seed,
        speedKmh: opts.speed,
      });
      for (const r of runs) {
        console.log(
          `run ${r.run}: stops=${r.stops} tour=${r.tour.join(',')} travel=${formatDuration(
            r.travelSec,
          )} finish=${formatClock(r.finishSec)} ${r.covered ? 'ok' : 'MISSING STOPS'}`,
        );
      }
      if (runs.some((r) => !r.covered)) {
        process.exitCode = 1;
      }
    } catch (err) {
      reportError(err);
    }
  });

export function run(argv: string[] = process.argv): Promise<Command> {
  return program.parseAsync(argv);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
