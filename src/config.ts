import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { InvalidConfigError } from './core/errors.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
    port: number;
  };
  openai: {
    apiKey: string;
    baseUrl: string;
    model: string;
  };
  prompt: {
    file?: string;
  };
  storage: {
    dataDir: string;
  };
  modelWatch: {
    intervalSeconds: number;
    noticeGroupId?: string;
  };
}

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
    port: z.number().int().min(0).max(65535),
  }),
  openai: z.object({
    apiKey: z.string(),
    baseUrl: z.string().url('Invalid OpenAI base URL format'),
    model: z.string().min(1, 'Default model must not be empty'),
  }),
  prompt: z.object({
    file: z.string().min(1).optional(),
  }),
  storage: z.object({
    dataDir: z.string().min(1, 'Data directory must not be empty'),
  }),
  modelWatch: z.object({
    intervalSeconds: z.number().int().min(0).max(86400),
    noticeGroupId: z.string().min(1).optional(),
  }),
});

type CliArgs = Record<string, string | boolean>;

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --base-url https://api.openai.com/v1 --model gpt-4o-mini --debug
 */
export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from environment variables or CLI arguments.
 * CLI flags win over environment variables; the result is validated against the schema.
 */
export function getConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const value = getString(cliKey, envKey, '').trim();
    return value ? value : undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = getString(cliKey, envKey, '');
    return value ? Number(value) : defaultValue;
  };

  const dataDir = getString('data-dir', 'DATA_DIR', path.join('data', 'openai'));

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'chat-relay'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      port: getNumber('port', 'PORT', 8080),
    },
    openai: {
      apiKey: getString('api-key', 'OPENAI_API_KEY', '').trim(),
      baseUrl: getString('base-url', 'OPENAI_BASE_URL', 'https://api.openai.com/v1'),
      model: getString('model', 'OPENAI_MODEL', 'gpt-4o-mini'),
    },
    prompt: {
      file: getOptionalString('prompt-file', 'PROMPT_FILE'),
    },
    storage: {
      dataDir: path.isAbsolute(dataDir) ? dataDir : path.join(cwd, dataDir),
    },
    modelWatch: {
      intervalSeconds: getNumber('model-watch-interval', 'MODEL_WATCH_INTERVAL_SECONDS', 60),
      noticeGroupId: getOptionalString('model-notice-group', 'MODELS_NOTICE_GROUP'),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }
  return result.data;
}

function maskSecret(secret: string): string {
  if (!secret) return '(not set)';
  return secret.length <= 8 ? '****' : `${secret.slice(0, 3)}...${secret.slice(-4)}`;
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('═'.repeat(68));
  console.error(`  ${config.server.name} v${config.server.version}${config.server.debug ? ' (Debug Mode)' : ''}`);
  console.error('═'.repeat(68));

  console.error(`\n🔗 Provider: ${config.openai.baseUrl}`);
  console.error(`🔑 API key:  ${maskSecret(config.openai.apiKey)}`);
  console.error(`🤖 Model:    ${config.openai.model}`);
  console.error(`📝 Prompt:   ${config.prompt.file ?? '(none)'}`);
  console.error(`💾 Data:     ${config.storage.dataDir}`);
  console.error(`🌐 HTTP:     port ${config.server.port}`);

  if (config.modelWatch.intervalSeconds > 0) {
    const target = config.modelWatch.noticeGroupId ? ` → group ${config.modelWatch.noticeGroupId}` : '';
    console.error(`👀 Model watch: every ${config.modelWatch.intervalSeconds}s${target}`);
  } else {
    console.error('👀 Model watch: disabled');
  }

  console.error('\n' + '─'.repeat(68));
}
