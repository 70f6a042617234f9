import { Command, Option } from "commander";
import { logger } from "../utils/logger";
import { runExtract } from "./commands";
import { parseIntegerOption, parseNumberOption, readInputText } from "./input";

interface ExtractCliOptions {
  config?: string;
  text?: string;
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
    .name("extract")
    .description("Extract named entities from text with a chat-completion model")
    .option("-c, --config <file>", "YAML or JSON config file")
    .option("-t, --text <text>", "Text to analyse (default: stdin)")
    .option("-f, --file <file>", "Read the text from a file")
    .addOption(new Option("--provider <name>", "Client provider").choices(["openrouter", "mock"]))
    .option("-m, --model <id>", "Model identifier")
    .option("--system <prompt>", "Override the extraction system prompt")
    .option("--max-tokens <n>", "Maximum tokens to generate", parseIntegerOption)
    .option("--temperature <value>", "Sampling temperature (service default when omitted)", parseNumberOption)
    .option("--api-url <url>", "Chat completions endpoint")
    .option("--no-json", "Do not request structured JSON output");

  program.showHelpAfterError();
  program.parse(process.argv);
  const opts = program.opts<ExtractCliOptions>();
  // --no-json defaults json to true; only an explicit flag overrides the config file
  if (program.getOptionValueSource("json") === "default") {
    opts.json = undefined;
  }

  const text = await readInputText({ text: opts.text, file: opts.file });
  const code = await runExtract(text, opts, {
    write: (line) => process.stdout.write(`${line}\n`),
  });
  process.exitCode = code;
}

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
