import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";
import type { IndexRunReport } from "@lorebase/shared";
import { appConfig } from "../config.js";
import { describeError } from "../errors.js";
import type { IndexingPipeline } from "../pipeline/IndexingPipeline.js";
import { closeRuntime, getIndexingPipelineSingleton } from "../runtime/ragRuntime.js";
import { logger } from "../utils/logger.js";

export const EXIT_OK = 0;
export const EXIT_DOCUMENT_FAILURES = 1;
export const EXIT_FATAL = 2;

const USAGE = `Usage: npm run index -- [--path <dir>] [--force] [--probe "<question>"] [--no-prune]

  --path, -p   documents directory (default: ${appConfig.DOCUMENTS_DIR})
  --force, -f  drop the index and rebuild it from scratch
  --probe      search the fresh index with this question and print the hits
  --no-prune   keep indexed documents whose files are gone
  --help, -h   show this message`;

export interface IndexCommandDeps {
  pipeline: Pick<IndexingPipeline, "run">;
  write: (line: string) => void;
}

function parseIndexArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      path: { type: "string", short: "p" },
      force: { type: "boolean", short: "f" },
      probe: { type: "string" },
      "no-prune": { type: "boolean" },
      help: { type: "boolean", short: "h" }
    },
    strict: true,
    allowPositionals: false
  });
}

/** Exit status: 0 when every document indexed, 1 when some failed, 2 when the run could not happen. */
export async function runIndexCommand(argv: string[], deps: IndexCommandDeps): Promise<number> {
  let values: ReturnType<typeof parseIndexArgs>["values"];
  try {
    ({ values } = parseIndexArgs(argv));
  } catch (error) {
    deps.write(describeError(error));
    deps.write(USAGE);
    return EXIT_FATAL;
  }

  if (values.help) {
    deps.write(USAGE);
    return EXIT_OK;
  }

  const directory = values.path ?? appConfig.DOCUMENTS_DIR;
  let report: IndexRunReport;
  try {
    report = await deps.pipeline.run({
      directory,
      force: values.force ?? false,
      ...(values.probe ? { probe: values.probe } : {}),
      ...(values["no-prune"] ? { prune: false } : {})
    });
  } catch (error) {
    logger.error({ err: error, directory }, "Indexing run aborted");
    deps.write(`Indexing failed: ${describeError(error)}`);
    return EXIT_FATAL;
  }

  for (const line of formatReport(report)) {
    deps.write(line);
  }
  return report.totals.failed > 0 ? EXIT_DOCUMENT_FAILURES : EXIT_OK;
}

export function formatReport(report: IndexRunReport): string[] {
  const { totals } = report;
  const lines = [
    `Indexed ${totals.indexed}, unchanged ${totals.unchanged}, empty ${totals.empty}, ` +
      `removed ${totals.removed}, failed ${totals.failed}${report.force ? " (forced rebuild)" : ""}`
  ];

  for (const outcome of report.outcomes) {
    if (outcome.status === "failed") {
      lines.push(`  failed  ${outcome.sourcePath}  [${outcome.stage ?? "unknown"}] ${outcome.error ?? ""}`.trimEnd());
    }
  }

  lines.push(`Total chunks: ${totals.chunks}`);
  lines.push(`Average chunk size: ${totals.averageChunkSize} characters`);
  lines.push(`Source files: ${report.sources.length}`);

  if (report.probe) {
    const top = report.probe.hits[0];
    lines.push(
      top
        ? `Probe "${report.probe.query}": ${report.probe.hits.length} hit(s), top ${top.documentName} (${top.score.toFixed(3)})`
        : `Probe "${report.probe.query}": no hits`
    );
  }

  lines.push(`Finished in ${report.durationMs} ms`);
  return lines;
}

async function main(): Promise<void> {
  const code = await runIndexCommand(process.argv.slice(2), {
    pipeline: getIndexingPipelineSingleton(),
    write: (line) => process.stdout.write(`${line}\n`)
  });
  await closeRuntime();
  process.exitCode = code;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    logger.fatal({ err: error }, "Indexing command crashed");
    process.exitCode = EXIT_FATAL;
  });
}
