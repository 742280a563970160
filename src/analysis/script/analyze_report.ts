/* eslint-disable no-console */
// Load envs from .env
// npm run analyze -- --financial annual.pdf --sustainability esg.pdf
import "dotenv/config";
import { shutdownTelemetry } from "../../ai/telemetry";
import {
  createAnalysisPipeline,
  type AnalysisPipeline,
} from "../application/analyze_report";
import { loadAnalysisConfig } from "../config";
import { summaryText } from "../business/summarize";

export interface CliArgs {
  financial?: string;
  sustainability?: string;
  rubricVersion?: string;
  json: boolean;
}

const USAGE =
  "Usage: analyze_report --financial <report.pdf> --sustainability <report.pdf> [--rubric <version>] [--json]";

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { json: false };
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const next = (): string => {
      const value = argv[++i];
      if (value === undefined || value.startsWith("--")) {
        throw new Error(`${flag} needs a value\n${USAGE}`);
      }
      return value;
    };
    if (flag === "--financial") args.financial = next();
    else if (flag === "--sustainability") args.sustainability = next();
    else if (flag === "--rubric") args.rubricVersion = next();
    else if (flag === "--json") args.json = true;
    else throw new Error(`Unknown argument: ${flag}\n${USAGE}`);
  }
  if (!args.financial && !args.sustainability) {
    throw new Error(`At least one report is required\n${USAGE}`);
  }
  return args;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadAnalysisConfig();
  if (args.rubricVersion) config.rubricVersion = args.rubricVersion;
  const pipeline = createAnalysisPipeline(config);
  try {
    await run(pipeline, args);
  } finally {
    await shutdownTelemetry();
  }
}

export async function run(pipeline: AnalysisPipeline, args: CliArgs) {
  const documents = await pipeline.loadDocuments({
    financial: args.financial,
    sustainability: args.sustainability,
  });
  const outcome = await pipeline.analyze(documents);

  if (args.json) {
    console.log(
      JSON.stringify(
        { report: outcome.report, summary: outcome.summary },
        null,
        2
      )
    );
    return;
  }
  console.log(outcome.formatted);
  console.log("");
  console.log(summaryText(outcome.summary));
}

if (require.main === module) {
  main().catch(err => {
    console.error(err);
    process.exit(1);
  });
}
