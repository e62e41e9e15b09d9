/**
 * Value state stores - persistence of the global value function and the
 * alignment/drift history.
 *
 * Both stores hold one whole record and follow read-entire / write-entire.
 * Callers guarantee a single writer.
 *
 *   JsonFileValueStore  pretty JSON file, written atomically (tmp + rename)
 *   SqliteValueStore    single-row table in a better-sqlite3 database
 *
 * CONTRACT: Synchronous API (better-sqlite3 blocks by design)
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { atomicWriteJsonSync } from './atomic_write';
import { SQLITE_PATH, STATE_PATH, type StoreKind } from './config';
import { GOAL_TYPES, isGoalType, isOptimizationTarget, OPTIMIZATION_TARGETS } from './governance_types';
import { createLogger } from './logger';
import { formatValidationErrors, type JsonSchema, SchemaValidator } from './schema_validator';
import { errorMessage, ValueStateError } from './structured_error';
import type { GlobalGoal, GlobalValueFunctionRecord, ValueConstraints } from './value_function';

const log = createLogger('value-store');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface AlignmentRecord {
    timestamp: string;
    agent_id: string;
    action_type: string;
    aligned: boolean;
    alignment_score: number;
    warnings: string[];
}

export type DriftEvent = AlignmentRecord;

export interface PersistedValueState {
    version: string;
    last_updated: string;
    global_value_function: GlobalValueFunctionRecord;
    alignment_history: AlignmentRecord[];
    drift_events: DriftEvent[];
}

export interface ValueStateStore {
    readonly location: string;
    /** null when nothing has been stored yet; throws ValueStateError on an unreadable record. */
    load(): PersistedValueState | null;
    save(state: PersistedValueState): void;
}

/* -------------------------------------------------------------------------- */
/* Schema + decoding                                                          */
/* -------------------------------------------------------------------------- */

const UNIT_INTERVAL: JsonSchema = { type: 'number', minimum: 0, maximum: 1 };

const ALIGNMENT_RECORD_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['timestamp', 'agent_id', 'action_type', 'aligned', 'alignment_score', 'warnings'],
    properties: {
        timestamp: { type: 'string' },
        agent_id: { type: 'string' },
        action_type: { type: 'string' },
        aligned: { type: 'boolean' },
        alignment_score: { type: 'number' },
        warnings: { type: 'array', items: { type: 'string' } },
    },
};

export const VALUE_STATE_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['version', 'last_updated', 'global_value_function', 'alignment_history', 'drift_events'],
    properties: {
        version: { type: 'string' },
        last_updated: { type: 'string' },
        global_value_function: {
            type: 'object',
            required: ['version', 'goals', 'constraints', 'optimization_target', 'created_at', 'updated_at'],
            properties: {
                version: { type: 'string' },
                goals: {
                    type: 'array',
                    items: {
                        type: 'object',
                        required: ['goal_type', 'weight', 'threshold', 'description', 'metrics'],
                        properties: {
                            goal_type: { type: 'string', enum: GOAL_TYPES },
                            weight: UNIT_INTERVAL,
                            threshold: UNIT_INTERVAL,
                            description: { type: 'string' },
                            metrics: { type: 'array', items: { type: 'string' } },
                        },
                    },
                },
                constraints: { type: 'object' },
                optimization_target: { type: 'string', enum: OPTIMIZATION_TARGETS },
                created_at: { type: 'string' },
                updated_at: { type: 'string' },
            },
        },
        alignment_history: { type: 'array', items: ALIGNMENT_RECORD_SCHEMA },
        drift_events: { type: 'array', items: ALIGNMENT_RECORD_SCHEMA },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('value_state_v1', VALUE_STATE_SCHEMA);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(source: Record<string, unknown>, key: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : '';
}

function num(source: Record<string, unknown>, key: string): number {
    const value = source[key];
    return typeof value === 'number' ? value : 0;
}

function strings(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function records(value: unknown): Record<string, unknown>[] {
    return Array.isArray(value) ? value.filter(isRecord) : [];
}

function decodeAlignmentRecord(raw: Record<string, unknown>): AlignmentRecord {
    return {
        timestamp: str(raw, 'timestamp'),
        agent_id: str(raw, 'agent_id'),
        action_type: str(raw, 'action_type'),
        aligned: raw.aligned === true,
        alignment_score: num(raw, 'alignment_score'),
        warnings: strings(raw.warnings),
    };
}

function decodeGoal(raw: Record<string, unknown>): GlobalGoal | null {
    if (!isGoalType(raw.goal_type)) return null;
    return {
        goal_type: raw.goal_type,
        weight: num(raw, 'weight'),
        threshold: num(raw, 'threshold'),
        description: str(raw, 'description'),
        metrics: strings(raw.metrics),
    };
}

function decodeConstraints(raw: unknown): ValueConstraints {
    const out: ValueConstraints = {};
    if (!isRecord(raw)) return out;
    for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean') {
            out[key] = value;
        }
    }
    return out;
}

/** Validate a parsed document and convert it to a PersistedValueState. */
export function decodeValueState(document: unknown, location: string): PersistedValueState {
    const result = validator.validate(document, 'value_state_v1');
    if (!result.valid || !isRecord(document) || !isRecord(document.global_value_function)) {
        const issues = formatValidationErrors(result.errors);
        throw new ValueStateError(`Invalid value state record: ${issues.join('; ')}`, location);
    }

    const gvf = document.global_value_function;
    const target = isOptimizationTarget(gvf.optimization_target) ? gvf.optimization_target : 'balance';

    return {
        version: str(document, 'version'),
        last_updated: str(document, 'last_updated'),
        global_value_function: {
            version: str(gvf, 'version'),
            goals: records(gvf.goals)
                .map(decodeGoal)
                .filter((g): g is GlobalGoal => g !== null),
            constraints: decodeConstraints(gvf.constraints),
            optimization_target: target,
            created_at: str(gvf, 'created_at'),
            updated_at: str(gvf, 'updated_at'),
        },
        alignment_history: records(document.alignment_history).map(decodeAlignmentRecord),
        drift_events: records(document.drift_events).map(decodeAlignmentRecord),
    };
}

function parseJson(text: string, location: string): unknown {
    try {
        return JSON.parse(text);
    } catch (e) {
        throw new ValueStateError(`Value state is not valid JSON: ${errorMessage(e)}`, location, e);
    }
}

/* -------------------------------------------------------------------------- */
/* JSON file store                                                            */
/* -------------------------------------------------------------------------- */

export class JsonFileValueStore implements ValueStateStore {
    readonly location: string;

    constructor(filePath: string = STATE_PATH) {
        this.location = path.resolve(filePath);
    }

    load(): PersistedValueState | null {
        if (!fs.existsSync(this.location)) return null;

        let text: string;
        try {
            text = fs.readFileSync(this.location, 'utf8');
        } catch (e) {
            throw new ValueStateError(`Cannot read value state: ${errorMessage(e)}`, this.location, e);
        }
        return decodeValueState(parseJson(text, this.location), this.location);
    }

    save(state: PersistedValueState): void {
        const warnings: string[] = [];
        atomicWriteJsonSync({
            filePath: this.location,
            data: state,
            mode: 0o644,
            fsyncMode: 'BEST_EFFORT',
            warnings,
        });
        for (const w of warnings) {
            log.warn(w, { location: this.location });
        }
    }
}

/* -------------------------------------------------------------------------- */
/* SQLite store                                                               */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;

export class SqliteValueStore implements ValueStateStore {
    readonly location: string;
    private readonly db: Database.Database;

    constructor(dbPath: string = SQLITE_PATH) {
        const inMemory = dbPath === ':memory:';
        this.location = inMemory ? dbPath : path.resolve(dbPath);
        if (!inMemory) {
            fs.mkdirSync(path.dirname(this.location), { recursive: true });
        }

        this.db = new Database(this.location);
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('synchronous = NORMAL');
        this.db.pragma('busy_timeout = 5000');
        this.migrate();
    }

    private migrate(): void {
        const tx = this.db.transaction(() => {
            this.db.exec(`
                CREATE TABLE IF NOT EXISTS schema_version (
                    version INTEGER PRIMARY KEY,
                    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
                )
            `);

            const row: unknown = this.db
                .prepare(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
                .get();
            const current = isRecord(row) && typeof row.version === 'number' ? row.version : 0;

            if (current < 1) {
                this.db.exec(`
                    CREATE TABLE IF NOT EXISTS value_state (
                        id INTEGER PRIMARY KEY CHECK (id = 1),
                        payload TEXT NOT NULL,
                        updated_at TEXT NOT NULL
                    )
                `);
                this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
            }

            // Future migrations: add only, never remove.
        });
        tx();
        log.debug('SQLite value store ready', { location: this.location, schema_version: SCHEMA_VERSION });
    }

    load(): PersistedValueState | null {
        const row: unknown = this.db.prepare(`SELECT payload FROM value_state WHERE id = 1`).get();
        if (row === undefined) return null;
        if (!isRecord(row) || typeof row.payload !== 'string') {
            throw new ValueStateError('Value state row has no payload', this.location);
        }
        return decodeValueState(parseJson(row.payload, this.location), this.location);
    }

    save(state: PersistedValueState): void {
        this.db
            .prepare(`
                INSERT INTO value_state (id, payload, updated_at) VALUES (1, ?, ?)
                ON CONFLICT(id) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at
            `)
            .run(JSON.stringify(state), state.last_updated);
    }

    close(): void {
        this.db.close();
    }
}

export function createValueStore(kind: StoreKind, location?: string): ValueStateStore {
    return kind === 'sqlite' ? new SqliteValueStore(location) : new JsonFileValueStore(location);
}
