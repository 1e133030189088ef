import { z } from "zod";
import { MODEL_CONFIG, MODEL_PROVIDERS } from "@medeval/core";
import { ValidationError } from "@medeval/shared";
import { EVAL_DEFAULTS } from "../config.js";

/** Flags taking a value, mapped to their option key. */
const VALUE_FLAGS = {
  "--input": "input",
  "--outdir": "outdir",
  "--responder-model": "responderModel",
  "--judge-model": "judgeModel",
  "--responder-provider": "responderProvider",
  "--judge-provider": "judgeProvider",
  "--temperature": "temperature",
  "--rate-limit-s": "rateLimitS",
  "--start": "start",
  "--end": "end",
} as const;

const SWITCH_FLAGS = {
  "--skip-generate": "skipGenerate",
  "--skip-judge": "skipJudge",
  "--help": "help",
  "-h": "help",
} as const;

type ValueKey = (typeof VALUE_FLAGS)[keyof typeof VALUE_FLAGS];
type SwitchKey = (typeof SWITCH_FLAGS)[keyof typeof SWITCH_FLAGS];

function isValueFlag(arg: string): arg is keyof typeof VALUE_FLAGS {
  return Object.hasOwn(VALUE_FLAGS, arg);
}

function isSwitchFlag(arg: string): arg is keyof typeof SWITCH_FLAGS {
  return Object.hasOwn(SWITCH_FLAGS, arg);
}

function flagFor(key: PropertyKey | undefined): string {
  const entry = Object.entries(VALUE_FLAGS).find(([, value]) => value === key);
  return entry ? entry[0] : `--${String(key)}`;
}

function cliOptionsSchema(env: NodeJS.ProcessEnv) {
  return z.object({
    input: z.string().min(1).default(EVAL_DEFAULTS.input),
    outdir: z.string().min(1).default(EVAL_DEFAULTS.outdir),
    responderModel: z
      .string()
      .min(1)
      .default(env.RESPONDER_MODEL || MODEL_CONFIG.responder.model),
    judgeModel: z
      .string()
      .min(1)
      .default(env.JUDGE_MODEL || MODEL_CONFIG.judge.model),
    responderProvider: z
      .enum(MODEL_PROVIDERS)
      .default(MODEL_CONFIG.responder.provider),
    judgeProvider: z.enum(MODEL_PROVIDERS).default(MODEL_CONFIG.judge.provider),
    temperature: z.coerce
      .number()
      .min(0)
      .max(2)
      .default(EVAL_DEFAULTS.temperature),
    rateLimitS: z.coerce.number().min(0).default(EVAL_DEFAULTS.rateLimitS),
    start: z.coerce.number().int().min(0).default(EVAL_DEFAULTS.start),
    end: z.coerce.number().int().min(0).optional(),
    skipGenerate: z.boolean().default(false),
    skipJudge: z.boolean().default(false),
    help: z.boolean().default(false),
  });
}

export type CliOptions = z.infer<ReturnType<typeof cliOptionsSchema>>;

/**
 * Parses CLI arguments (without the node and script entries).
 *
 * @throws {ValidationError} On an unknown flag, a missing value, or a value
 *   that fails validation
 */
export function parseCliArgs(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  const raw: Partial<Record<ValueKey, string> & Record<SwitchKey, boolean>> =
    {};
  const args = argv.filter((arg) => arg !== "--");

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (isSwitchFlag(arg)) {
      raw[SWITCH_FLAGS[arg]] = true;
      continue;
    }
    if (isValueFlag(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith("--")) {
        throw new ValidationError(`${arg} requires a value`);
      }
      raw[VALUE_FLAGS[arg]] = value;
      i++;
      continue;
    }
    throw new ValidationError(`Unknown argument "${arg}"`);
  }

  const result = cliOptionsSchema(env).safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ValidationError(
      `Invalid value for ${flagFor(issue?.path[0])}: ${issue?.message ?? "invalid"}`,
      { context: { issues: result.error.issues } },
    );
  }
  return result.data;
}

export function usage(): string {
  return `
Usage: npm run eval -- [options]

Options:
  --input <path>              Dataset JSON (default: ${EVAL_DEFAULTS.input})
  --outdir <dir>              Output directory (default: ${EVAL_DEFAULTS.outdir})
  --responder-model <name>    Responder model (default: $RESPONDER_MODEL or ${MODEL_CONFIG.responder.model})
  --judge-model <name>        Judge model (default: $JUDGE_MODEL or ${MODEL_CONFIG.judge.model})
  --responder-provider <p>    ${MODEL_PROVIDERS.join(" | ")} (default: ${MODEL_CONFIG.responder.provider})
  --judge-provider <p>        ${MODEL_PROVIDERS.join(" | ")} (default: ${MODEL_CONFIG.judge.provider})
  --temperature <t>           Responder temperature (default: ${EVAL_DEFAULTS.temperature})
  --rate-limit-s <s>          Pause after each successful request (default: ${EVAL_DEFAULTS.rateLimitS})
  --start <n>                 First index, inclusive (default: ${EVAL_DEFAULTS.start})
  --end <n>                   Last index, exclusive (default: dataset length)
  --skip-generate             Reuse stored answers
  --skip-judge                Stop after generating answers
  --help                      Show this help message

Examples:
  npm run eval -- --input dataset/MAIA.json --end 50
  npm run eval -- --skip-generate --judge-provider anthropic --judge-model claude-3-5-sonnet-latest
`;
}
