#!/usr/bin/env node
/**
 * CLI Entry Point for the refinement engine
 */

import * as fs from 'fs';
import * as path from 'path';
import { defaultConfigDir, defaultConfigPath, loadConfig, missingCredentials, RefinerConfig, credentialEnvName } from './config';
import { createLogger } from './logger';
import { toErrorPayload } from './structured_error';
import { createRefiner, Refiner } from './workflow_orchestrator';

export interface RunArgs {
    prompt: string;
    language: string;
    features: string[];
    configPath?: string;
}

export type ParsedArgs<T> = { ok: true; value: T } | { ok: false; message: string };

/** `run "<prompt>" [--language L] [--feature F]... [--config PATH]` */
export function parseRunArgs(args: string[]): ParsedArgs<RunArgs> {
    const features: string[] = [];
    let language = 'python';
    let configPath: string | undefined;
    let prompt: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--language' || arg === '--feature' || arg === '--config') {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { ok: false, message: `${arg} requires a value` };
            }
            i++;
            if (arg === '--language') language = value;
            else if (arg === '--feature') features.push(value);
            else configPath = value;
        } else if (arg.startsWith('--')) {
            return { ok: false, message: `Unknown option: ${arg}` };
        } else if (prompt === undefined) {
            prompt = arg;
        } else {
            return { ok: false, message: `Unexpected argument: ${arg}` };
        }
    }

    if (!prompt || !prompt.trim()) {
        return { ok: false, message: 'A prompt is required' };
    }
    return { ok: true, value: { prompt, language, features, ...(configPath ? { configPath } : {}) } };
}

export interface HistoryArgs {
    entryId: string;
    configPath?: string;
}

export interface UsageArgs {
    days: number;
    configPath?: string;
}

/** `history <entryId> [--config PATH]` */
export function parseHistoryArgs(args: string[]): ParsedArgs<HistoryArgs> {
    let entryId: string | undefined;
    let configPath: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--config') {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { ok: false, message: '--config requires a value' };
            }
            configPath = value;
            i++;
        } else if (arg.startsWith('--')) {
            return { ok: false, message: `Unknown option: ${arg}` };
        } else if (entryId === undefined) {
            entryId = arg;
        } else {
            return { ok: false, message: `Unexpected argument: ${arg}` };
        }
    }

    if (!entryId) {
        return { ok: false, message: 'entry id required' };
    }
    return { ok: true, value: { entryId, ...(configPath ? { configPath } : {}) } };
}

/** `usage [--days N] [--config PATH]` */
export function parseUsageArgs(args: string[]): ParsedArgs<UsageArgs> {
    let days = 30;
    let configPath: string | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--days') {
            const raw = args[i + 1];
            const n = Number(raw);
            if (raw === undefined || !Number.isInteger(n) || n < 1) {
                return { ok: false, message: `--days must be a positive integer, got '${raw ?? ''}'` };
            }
            days = n;
            i++;
        } else if (arg === '--config') {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                return { ok: false, message: '--config requires a value' };
            }
            configPath = value;
            i++;
        } else if (arg.startsWith('--')) {
            return { ok: false, message: `Unknown option: ${arg}` };
        } else {
            return { ok: false, message: `Unexpected argument: ${arg}` };
        }
    }
    return { ok: true, value: { days, ...(configPath ? { configPath } : {}) } };
}

/** Config written by `refiner init`. Endpoints are placeholders to edit. */
export function starterConfig(): Record<string, unknown> {
    return {
        maxIterations: 5,
        iterationLimit: 3,
        rotationStrategy: 'round_robin',
        models: {
            claude: { endpoint: 'https://llm.example.invalid/claude', temperature: 0.7, maxTokens: 2000 },
            gemini: { endpoint: 'https://llm.example.invalid/gemini', temperature: 0.7, maxTokens: 2000 },
        },
        taskModels: {
            generation: ['claude', 'gemini'],
            checking: ['claude', 'gemini'],
            fixing: ['claude'],
            feature: ['claude'],
        },
        credentials: {},
        rateLimits: {
            claude: { callsPerMinute: 60, tokensPerMinute: 10000 },
            gemini: { callsPerMinute: 60, tokensPerMinute: 10000 },
        },
        dbPath: path.join(defaultConfigDir(), 'refiner.db'),
    };
}

class RefinerCLI {
    private readonly log = createLogger('cli');

    async run(args: string[]): Promise<void> {
        const command = args[2] || 'help';
        const rest = args.slice(3);

        switch (command) {
            case 'init':
                this.runInit();
                break;
            case 'run':
                await this.runWorkflow(rest);
                break;
            case 'history':
                this.runHistory(rest);
                break;
            case 'usage':
                this.runUsage(rest);
                break;
            case 'help':
                this.showHelp();
                break;
            default:
                console.error(`Unknown command: ${command}`);
                this.showHelp();
                process.exitCode = 1;
        }
    }

    private runInit(): void {
        const configPath = defaultConfigPath();
        if (fs.existsSync(configPath)) {
            console.log('Configuration already exists at:', configPath);
            console.log('   To reinitialize, delete the existing config first.');
            return;
        }

        fs.mkdirSync(path.dirname(configPath), { recursive: true });
        fs.writeFileSync(configPath, JSON.stringify(starterConfig(), null, 2), { mode: 0o600 });
        console.log('Created config file:', configPath);
        console.log('\nNext steps:');
        console.log('   1. Point each model endpoint at your backend');
        console.log(`   2. Export credentials, e.g. ${credentialEnvName('claude')}=...`);
        console.log('   3. Run: refiner run "a function that adds two numbers"');
    }

    private async runWorkflow(args: string[]): Promise<void> {
        const parsed = parseRunArgs(args);
        if (!parsed.ok) {
            console.error(`Error: ${parsed.message}`);
            console.error('Usage: refiner run "<prompt>" [--language <lang>] [--feature <text>]... [--config <path>]');
            process.exitCode = 1;
            return;
        }
        const { prompt, language, features, configPath } = parsed.value;

        const refiner = this.open(configPath);
        if (!refiner) return;

        try {
            const result = features.length > 0
                ? await refiner.orchestrator.generateFeatureEnhancedCode(prompt, features, language)
                : await refiner.orchestrator.runWorkflow(prompt, language);
            console.log(JSON.stringify(result, null, 2));
        } catch (err) {
            console.error(JSON.stringify(toErrorPayload(err), null, 2));
            process.exitCode = 1;
        } finally {
            refiner.store.close();
        }
    }

    private runHistory(args: string[]): void {
        const parsed = parseHistoryArgs(args);
        if (!parsed.ok) {
            console.error(`Error: ${parsed.message}`);
            console.error('Usage: refiner history <entryId> [--config <path>]');
            process.exitCode = 1;
            return;
        }
        const { entryId, configPath } = parsed.value;

        const refiner = this.open(configPath);
        if (!refiner) return;

        try {
            const entry = refiner.store.getEntry(entryId);
            if (!entry) {
                console.error(`Error: No workflow entry with id ${entryId}`);
                process.exitCode = 1;
                return;
            }
            console.log(JSON.stringify({
                entry,
                versions: refiner.store.getVersions(entryId),
                bugReports: refiner.store.getBugReports(entryId),
            }, null, 2));
        } finally {
            refiner.store.close();
        }
    }

    private runUsage(args: string[]): void {
        const parsed = parseUsageArgs(args);
        if (!parsed.ok) {
            console.error(`Error: ${parsed.message}`);
            process.exitCode = 1;
            return;
        }

        const refiner = this.open(parsed.value.configPath);
        if (!refiner) return;

        try {
            const rows = refiner.analytics.getUsageReport(parsed.value.days);
            if (rows.length === 0) {
                console.log(`No API calls in the last ${parsed.value.days} day(s).`);
                return;
            }
            console.table(rows);
        } finally {
            refiner.store.close();
        }
    }

    private open(configPath?: string): Refiner | undefined {
        let config: RefinerConfig;
        try {
            config = loadConfig(configPath ? { path: configPath } : {});
        } catch (err) {
            const payload = toErrorPayload(err);
            console.error(`Error: ${payload.error}`);
            if (!configPath && !fs.existsSync(defaultConfigPath())) {
                console.error('   No configuration found. Run `refiner init` first.');
            }
            process.exitCode = 1;
            return undefined;
        }

        for (const id of missingCredentials(config)) {
            this.log.warn(`No credential for model ${id}; calls to it will fail`, { env: credentialEnvName(id) });
        }
        return createRefiner(config, { logger: this.log });
    }

    private showHelp(): void {
        console.log(`
Adversarial Refiner - multi-model code generation and bug fixing

USAGE:
  refiner <command> [options]

COMMANDS:
  init                       Create a starter config at ~/.refiner/config.json
  run "<prompt>"             Generate code and refine it until no bugs are reported
      --language <lang>      Target language (default: python)
      --feature <text>       Feature to inject (repeatable; switches to feature mode)
      --config <path>        Config file (default: $REFINER_CONFIG or ~/.refiner/config.json)
  history <entryId>          Show an entry with its versions and bug reports
  usage [--days N]           Calls and tokens per model and action (default: 30 days)

  run, history and usage all take --config <path>; use the same one for each.
  help                       Show this help

EXAMPLES:
  refiner init
  refiner run "a function that adds two numbers"
  refiner run "a todo list API" --language typescript --feature "pagination" --feature "sorting"
  refiner usage --days 7
  refiner history <entryId> --config ./refiner.json
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new RefinerCLI();
    cli.run(process.argv).catch((err: unknown) => {
        console.error('Fatal error:', err);
        process.exit(1);
    });
}

export { RefinerCLI };
