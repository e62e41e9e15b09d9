/**
 * Policy - project budgets, permissions and forbidden patterns.
 *
 * Loaded from a JSON file and validated against POLICY_SCHEMA. Permissions are
 * a closed record: unknown keys are dropped (with a warning) and any key not
 * granted explicitly is denied.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { formatValidationErrors, type JsonSchema, SchemaValidator } from './schema_validator';
import { PolicyLoadError, errorMessage } from './structured_error';

const log = createLogger('policy');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export const PERMISSION_KEYS = [
    'read_files',
    'write_files',
    'create_files',
    'delete_files',
    'run_commands',
    'network_access',
    'install_dependencies',
] as const;
export type PermissionKey = typeof PERMISSION_KEYS[number];
export type PermissionSet = Readonly<Record<PermissionKey, boolean>>;

export interface PolicyBudgets {
    max_loc: number;
    max_modules: number;
    max_files: number;
    max_dependencies: number;
}

export interface ForbiddenPattern {
    name: string;
    description: string;
    rule: string;
    severity: 'error' | 'warning';
}

export interface CostThresholds {
    warning: number;
    rejection: number;
    session_limit: number;
}

export interface Policy {
    version: string;
    project: { name: string; root: string };
    budgets: PolicyBudgets;
    permissions: PermissionSet;
    cost_thresholds: CostThresholds;
    forbidden_patterns: ForbiddenPattern[];
}

export const DEFAULT_COST_THRESHOLDS: CostThresholds = {
    warning: 100.0,
    rejection: 500.0,
    session_limit: 2000.0,
};

/* -------------------------------------------------------------------------- */
/* Schema                                                                     */
/* -------------------------------------------------------------------------- */

const POSITIVE_INT: JsonSchema = { type: 'integer', minimum: 1 };

export const POLICY_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['version', 'project', 'budgets', 'permissions'],
    properties: {
        version: { type: 'string' },
        project: {
            type: 'object',
            required: ['name', 'root'],
            properties: {
                name: { type: 'string' },
                root: { type: 'string' },
            },
        },
        budgets: {
            type: 'object',
            required: ['max_loc', 'max_modules', 'max_files', 'max_dependencies'],
            properties: {
                max_loc: POSITIVE_INT,
                max_modules: POSITIVE_INT,
                max_files: POSITIVE_INT,
                max_dependencies: POSITIVE_INT,
            },
        },
        permissions: {
            type: 'object',
            additionalProperties: { type: 'boolean' },
        },
        cost_thresholds: {
            type: 'object',
            properties: {
                warning: { type: 'number', minimum: 0 },
                rejection: { type: 'number', minimum: 0 },
                session_limit: { type: 'number', minimum: 0 },
            },
        },
        forbidden_patterns: {
            type: 'array',
            items: {
                type: 'object',
                required: ['name', 'description', 'rule'],
                properties: {
                    name: { type: 'string' },
                    description: { type: 'string' },
                    rule: { type: 'string' },
                    severity: { type: 'string', enum: ['error', 'warning'] },
                },
            },
        },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('policy_v1', POLICY_SCHEMA);

/* -------------------------------------------------------------------------- */
/* Permissions                                                                */
/* -------------------------------------------------------------------------- */

const PERMISSION_KEY_SET: ReadonlySet<string> = new Set<string>(PERMISSION_KEYS);

function isPermissionKey(key: string): key is PermissionKey {
    return PERMISSION_KEY_SET.has(key);
}

/** Build a closed permission set; unrecognised keys are ignored, missing keys deny. */
export function normalizePermissions(raw: Record<string, unknown>): PermissionSet {
    const granted: Record<PermissionKey, boolean> = {
        read_files: false,
        write_files: false,
        create_files: false,
        delete_files: false,
        run_commands: false,
        network_access: false,
        install_dependencies: false,
    };

    for (const [key, value] of Object.entries(raw)) {
        if (!isPermissionKey(key)) {
            log.warn(`Ignoring unrecognised permission`, { key });
            continue;
        }
        granted[key] = value === true;
    }
    return Object.freeze(granted);
}

export function isPermitted(permissions: PermissionSet, key: string): boolean {
    return isPermissionKey(key) && permissions[key];
}

/* -------------------------------------------------------------------------- */
/* Construction / loading                                                     */
/* -------------------------------------------------------------------------- */

export function createDefaultPolicy(projectName: string, projectRoot: string): Policy {
    return {
        version: '1.0',
        project: { name: projectName, root: projectRoot },
        budgets: { max_loc: 1000, max_modules: 10, max_files: 20, max_dependencies: 5 },
        permissions: normalizePermissions({ read_files: true, create_files: true, write_files: true }),
        cost_thresholds: { ...DEFAULT_COST_THRESHOLDS },
        forbidden_patterns: [],
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : '';
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number): number {
    const value = source[key];
    return typeof value === 'number' ? value : fallback;
}

/** Validate an already-parsed document and convert it to a Policy. */
export function parsePolicy(document: unknown): Policy {
    const result = validator.validate(document, 'policy_v1');
    if (!result.valid || !isRecord(document)) {
        const issues = formatValidationErrors(result.errors);
        throw new PolicyLoadError(`Policy validation failed:\n${issues.map(i => `  - ${i}`).join('\n')}`, issues);
    }

    const project = isRecord(document.project) ? document.project : {};
    const budgets = isRecord(document.budgets) ? document.budgets : {};
    const permissions = isRecord(document.permissions) ? document.permissions : {};
    const thresholds = isRecord(document.cost_thresholds) ? document.cost_thresholds : {};
    const patterns = Array.isArray(document.forbidden_patterns) ? document.forbidden_patterns : [];

    return {
        version: readString(document, 'version'),
        project: { name: readString(project, 'name'), root: readString(project, 'root') },
        budgets: {
            max_loc: readNumber(budgets, 'max_loc', 0),
            max_modules: readNumber(budgets, 'max_modules', 0),
            max_files: readNumber(budgets, 'max_files', 0),
            max_dependencies: readNumber(budgets, 'max_dependencies', 0),
        },
        permissions: normalizePermissions(permissions),
        cost_thresholds: {
            warning: readNumber(thresholds, 'warning', DEFAULT_COST_THRESHOLDS.warning),
            rejection: readNumber(thresholds, 'rejection', DEFAULT_COST_THRESHOLDS.rejection),
            session_limit: readNumber(thresholds, 'session_limit', DEFAULT_COST_THRESHOLDS.session_limit),
        },
        forbidden_patterns: patterns.filter(isRecord).map((p): ForbiddenPattern => ({
            name: readString(p, 'name'),
            description: readString(p, 'description'),
            rule: readString(p, 'rule'),
            severity: p.severity === 'warning' ? 'warning' : 'error',
        })),
    };
}

export function loadPolicy(filePath: string): Policy {
    const resolved = path.resolve(filePath);
    if (!fs.existsSync(resolved)) {
        throw new PolicyLoadError(`Policy file not found: ${resolved}`);
    }

    let document: unknown;
    try {
        document = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    } catch (e) {
        throw new PolicyLoadError(`Invalid policy JSON in ${resolved}: ${errorMessage(e)}`);
    }

    const policy = parsePolicy(document);
    log.info(`Policy loaded`, { path: resolved, project: policy.project.name, max_loc: policy.budgets.max_loc });
    return policy;
}
