#!/usr/bin/env node
/**
 * CLI Entry Point for the value kernel
 *
 *   value-kernel coordinate "<intent>" [--policy file] [--root dir] [--json]
 *   value-kernel goals "<intent>"
 *   value-kernel stats
 *   value-kernel reset
 */

import * as path from 'path';
import { STATE_PATH, SQLITE_PATH, STORE_KIND } from './config';
import { ThreeTierCoordinator, type CoordinationResult } from './coordinator';
import { IntentGoalExtractor } from './goal_extractor';
import { GlobalValueMemory } from './global_value_memory';
import { createDefaultPolicy, loadPolicy, type Policy } from './policy';
import { errorMessage, GovernanceError } from './structured_error';
import { createValueStore } from './value_store';
import { DryRunExecutionAgent, WorkspaceContextGatherer } from './workspace_context';

interface ParsedArgs {
    positional: string[];
    flags: Map<string, string | true>;
}

export function parseArgs(args: string[]): ParsedArgs {
    const positional: string[] = [];
    const flags = new Map<string, string | true>();

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (!arg.startsWith('--')) {
            positional.push(arg);
            continue;
        }
        const name = arg.slice(2);
        const next = args[i + 1];
        if (next !== undefined && !next.startsWith('--')) {
            flags.set(name, next);
            i++;
        } else {
            flags.set(name, true);
        }
    }
    return { positional, flags };
}

function flagString(parsed: ParsedArgs, name: string): string | undefined {
    const value = parsed.flags.get(name);
    return typeof value === 'string' ? value : undefined;
}

class ValueKernelCLI {
    constructor(
        private readonly out: (line: string) => void = line => console.log(line),
        private readonly err: (line: string) => void = line => console.error(line)
    ) {}

    /** Returns the process exit code. */
    async run(argv: string[]): Promise<number> {
        const command = argv[2] || 'help';
        const parsed = parseArgs(argv.slice(3));

        switch (command) {
            case 'coordinate':
                return this.runCoordinate(parsed);
            case 'goals':
                return this.runGoals(parsed);
            case 'stats':
                return this.runStats();
            case 'reset':
                return this.runReset();
            case 'help':
                this.showHelp();
                return 0;
            default:
                this.err(`Unknown command: ${command}`);
                this.showHelp();
                return 1;
        }
    }

    private openMemory(): GlobalValueMemory {
        const location = STORE_KIND === 'sqlite' ? SQLITE_PATH : STATE_PATH;
        return new GlobalValueMemory(createValueStore(STORE_KIND, location));
    }

    private resolvePolicy(parsed: ParsedArgs, root: string): Policy {
        const policyPath = flagString(parsed, 'policy');
        return policyPath ? loadPolicy(policyPath) : createDefaultPolicy(path.basename(root), root);
    }

    private async runCoordinate(parsed: ParsedArgs): Promise<number> {
        const intent = parsed.positional.join(' ').trim();
        if (!intent) {
            this.err('Error: an intent is required, e.g. value-kernel coordinate "add a date formatting helper"');
            return 1;
        }

        const root = path.resolve(flagString(parsed, 'root') ?? process.cwd());
        const policy = this.resolvePolicy(parsed, root);
        const coordinator = new ThreeTierCoordinator(
            policy,
            this.openMemory(),
            new WorkspaceContextGatherer(root),
            new DryRunExecutionAgent()
        );

        const result = await coordinator.coordinate(intent);
        if (parsed.flags.has('json')) {
            this.out(JSON.stringify(result, null, 2));
        } else {
            this.printResult(result);
        }
        return result.status === 'error' ? 2 : 0;
    }

    private printResult(result: CoordinationResult): void {
        for (const line of result.coordination_log) {
            this.out(line);
        }
        this.out('');

        if (result.status === 'error') {
            this.out(`FAILED: ${result.message}`);
            for (const opt of result.error.recovery_options) {
                const savings = opt.estimated_savings !== undefined ? ` (saves ~${opt.estimated_savings})` : '';
                this.out(`  - ${opt.action}: ${opt.description}${savings}`);
            }
            return;
        }

        const spec = result.specification;
        this.out(`Selected: ${spec.variant} | ${spec.budgets.max_loc_delta} LOC | risk ${spec.risk_level}`);
        this.out(
            `Budget: ${result.cost.budget_status}, ${result.cost.usage_percentage.toFixed(1)}% of max LOC; cost ${result.cost.total.toFixed(1)}`
        );
        if (result.refinement_instruction) {
            this.out(result.refinement_instruction.trimEnd());
        } else {
            this.out('Aligned: no refinement needed');
        }
    }

    private runGoals(parsed: ParsedArgs): number {
        const intent = parsed.positional.join(' ').trim();
        if (!intent) {
            this.err('Error: an intent is required');
            return 1;
        }
        this.out(JSON.stringify(new IntentGoalExtractor().extract(intent), null, 2));
        return 0;
    }

    private runStats(): number {
        const memory = this.openMemory();
        const stats = memory.getAlignmentStatistics();
        const vf = memory.getGlobalValueFunction();

        this.out(`Optimization target: ${vf.optimization_target}`);
        for (const goal of vf.goals) {
            this.out(`  ${goal.goal_type.padEnd(16)} weight ${goal.weight.toFixed(2)}  threshold ${goal.threshold.toFixed(2)}`);
        }
        this.out(`Validations: ${stats.total_validations} (aligned ${(stats.alignment_rate * 100).toFixed(1)}%)`);
        this.out(`Average alignment score: ${stats.average_alignment_score.toFixed(3)}`);
        this.out(`Drift events: ${stats.drift_event_count}`);
        if (stats.last_drift) {
            this.out(`Last drift: ${stats.last_drift.timestamp} ${stats.last_drift.agent_id} (${stats.last_drift.alignment_score.toFixed(2)})`);
        }
        return 0;
    }

    private runReset(): number {
        this.openMemory().resetToDefaults();
        this.out('Global value function reset to defaults; alignment history cleared.');
        return 0;
    }

    private showHelp(): void {
        this.out([
            'Usage: value-kernel <command> [options]',
            '',
            'Commands:',
            '  coordinate "<intent>"   Price, select and dry-run a specification for the intent',
            '      --policy <file>     Policy JSON (default: built-in policy for --root)',
            '      --root <dir>        Workspace to read context from (default: cwd)',
            '      --json              Print the full result as JSON',
            '  goals "<intent>"        Show the goals extracted from an intent',
            '  stats                   Show the global value function and alignment statistics',
            '  reset                   Restore the default value function and clear history',
            '',
            'Environment:',
            '  VALUE_KERNEL_STORE       json | sqlite',
            '  VALUE_KERNEL_STATE_PATH  JSON state file',
            '  VALUE_KERNEL_LOG_LEVEL   debug | info | warn | error | silent',
        ].join('\n'));
    }
}

// Run CLI
if (require.main === module) {
    const cli = new ValueKernelCLI();
    cli.run(process.argv)
        .then(code => {
            process.exitCode = code;
        })
        .catch((err: unknown) => {
            const prefix = err instanceof GovernanceError ? `${err.code}: ` : 'Fatal error: ';
            console.error(prefix + errorMessage(err));
            process.exitCode = 1;
        });
}

export { ValueKernelCLI };
