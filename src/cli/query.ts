import { Command, Option } from "commander";
import { logger } from "../utils/logger";
import { runQuery } from "./commands";
import { parseIntegerOption, parseNumberOption, readInputText } from "./input";

interface QueryCliOptions {
  config?: string;
  prompt?: string;
  file?: string;
  provider?: "openrouter" | "mock";
  model?: string;
  system?: string;
  maxTokens?: number;
  temperature?: number;
  apiUrl?: string;
  json?: boolean;
}

async function main() {
  const program = new Command();
  program
    .name("query")
    .description("Send a single prompt and print the generated text")
    .option("-c, --config <file>", "YAML or JSON config file")
    .option("-p, --prompt <text>", "Prompt to send (default: stdin)")
    .option("-f, --file <file>", "Read the prompt from a file")
    .addOption(new Option("--provider <name>", "Client provider").choices(["openrouter", "mock"]))
    .option("-m, --model <id>", "Model identifier")
    .option("--system <prompt>", "System prompt")
    .option("--max-tokens <n>", "Maximum tokens to generate", parseIntegerOption)
    .option("--temperature <value>", "Sampling temperature (service default when omitted)", parseNumberOption)
    .option("--api-url <url>", "Chat completions endpoint")
    .option("--json", "Request structured JSON output");

  program.showHelpAfterError();
  program.parse(process.argv);
  const opts = program.opts<QueryCliOptions>();

  const prompt = await readInputText({ text: opts.prompt, file: opts.file });
  process.exitCode = await runQuery(prompt, opts, {
    write: (line) => process.stdout.write(`${line}\n`),
  });
}

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
