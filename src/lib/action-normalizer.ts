import { z } from 'zod';
import { ParseError } from './errors';
import {
    DEFAULT_SWIPE_DURATION_MS,
    DEFAULT_WAIT_DURATION_MS,
    KEY_NAMES,
    SCROLL_DIRECTIONS,
    type KeyName,
    type NormalizedAction,
    type ParsePolicy,
    type ScrollDirection,
} from '@/types';

type Attempt =
    | { ok: true; action: NormalizedAction }
    | { ok: false; reason: string };

const coordinate = z.number().int().nonnegative();
const duration = z.number().int().positive();
const keyName = z.enum(KEY_NAMES);
const direction = z.enum(SCROLL_DIRECTIONS);

const pointSchema = { x: coordinate, y: coordinate };

const structuredActionSchema = z.discriminatedUnion('action_type', [
    z.object({ action_type: z.literal('click'), ...pointSchema }),
    z.object({ action_type: z.literal('double_tap'), ...pointSchema }),
    z.object({ action_type: z.literal('long_press'), ...pointSchema, duration: duration.optional() }),
    z.object({
        action_type: z.literal('swipe'),
        x1: coordinate.optional(),
        y1: coordinate.optional(),
        x2: coordinate.optional(),
        y2: coordinate.optional(),
        direction: direction.optional(),
        duration: duration.optional(),
    }),
    z.object({ action_type: z.literal('input_text'), text: z.string().min(1) }),
    z.object({ action_type: z.literal('text'), text: z.string().min(1) }),
    z.object({ action_type: z.literal('key'), key: keyName }),
    z.object({ action_type: z.literal('navigate_back') }),
    z.object({ action_type: z.literal('navigate_home') }),
    z.object({ action_type: z.literal('keyboard_enter') }),
    z.object({ action_type: z.literal('screenshot') }),
    z.object({ action_type: z.literal('scroll'), direction }),
    z.object({
        action_type: z.literal('open_app'),
        app_name: z.string().min(1).optional(),
        package: z.string().min(1).optional(),
    }),
    z.object({ action_type: z.literal('wait'), duration: duration.optional() }),
]);

type StructuredAction = z.infer<typeof structuredActionSchema>;

export const STRUCTURED_ACTION_TYPES: readonly StructuredAction['action_type'][] = structuredActionSchema.options
    .map((option) => option.shape.action_type.value);

export function listActionTypes(): string[] {
    return [...STRUCTURED_ACTION_TYPES];
}

function toNormalized(record: StructuredAction): Attempt {
    switch (record.action_type) {
        case 'click':
        case 'double_tap':
            return { ok: true, action: { kind: record.action_type, x: record.x, y: record.y } };
        case 'long_press':
            return {
                ok: true,
                action: record.duration === undefined
                    ? { kind: 'long_press', x: record.x, y: record.y }
                    : { kind: 'long_press', x: record.x, y: record.y, durationMs: record.duration },
            };
        case 'swipe': {
            const { x1, y1, x2, y2 } = record;
            if (x1 !== undefined && y1 !== undefined && x2 !== undefined && y2 !== undefined) {
                return {
                    ok: true,
                    action: { kind: 'swipe', x1, y1, x2, y2, durationMs: record.duration ?? DEFAULT_SWIPE_DURATION_MS },
                };
            }
            if ([x1, y1, x2, y2].some((value) => value !== undefined)) {
                return { ok: false, reason: 'swipe needs all of x1, y1, x2, y2 when any is given' };
            }
            if (record.direction) {
                return { ok: true, action: { kind: 'scroll', direction: record.direction } };
            }
            return { ok: false, reason: 'swipe needs x1, y1, x2, y2 or a direction' };
        }
        case 'input_text':
        case 'text':
            return { ok: true, action: { kind: 'text', value: record.text } };
        case 'key':
            return { ok: true, action: { kind: 'key', name: record.key } };
        case 'navigate_back':
            return { ok: true, action: { kind: 'key', name: 'back' } };
        case 'navigate_home':
            return { ok: true, action: { kind: 'key', name: 'home' } };
        case 'keyboard_enter':
            return { ok: true, action: { kind: 'key', name: 'enter' } };
        case 'screenshot':
            return { ok: true, action: { kind: 'screenshot' } };
        case 'scroll':
            return { ok: true, action: { kind: 'scroll', direction: record.direction } };
        case 'open_app': {
            const packageName = record.package ?? record.app_name;
            if (!packageName) {
                return { ok: false, reason: 'open_app needs package or app_name' };
            }
            return { ok: true, action: { kind: 'open_app', packageName } };
        }
        case 'wait':
            return { ok: true, action: { kind: 'wait', durationMs: record.duration ?? DEFAULT_WAIT_DURATION_MS } };
    }
}

function isMapping(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function looksLikeJsonObject(value: string): boolean {
    const trimmed = value.trim();
    return trimmed.startsWith('{') && trimmed.endsWith('}');
}

export function parseStructuredAction(raw: unknown): Attempt {
    let candidate = raw;
    if (typeof raw === 'string') {
        if (!looksLikeJsonObject(raw)) {
            return { ok: false, reason: 'not a mapping' };
        }
        try {
            candidate = JSON.parse(raw.trim());
        } catch {
            return { ok: false, reason: 'invalid JSON object' };
        }
    }

    if (!isMapping(candidate)) {
        return { ok: false, reason: 'not a mapping' };
    }

    const parsed = structuredActionSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
            .join(', ');
        return { ok: false, reason: issues };
    }

    return toNormalized(parsed.data);
}

function parseCoordinate(token: string | undefined): number | null {
    if (token === undefined || !/^\d+$/.test(token)) return null;
    const value = Number.parseInt(token, 10);
    return Number.isSafeInteger(value) ? value : null;
}

function parseDuration(token: string | undefined): number | null {
    const value = parseCoordinate(token);
    return value !== null && value > 0 ? value : null;
}

function isKeyName(value: string): value is KeyName {
    return KEY_NAMES.some((name) => name === value);
}

function isScrollDirection(value: string): value is ScrollDirection {
    return SCROLL_DIRECTIONS.some((direction) => direction === value);
}

function parsePoint(verb: 'click' | 'double_tap', args: string[]): Attempt {
    const x = parseCoordinate(args[0]);
    const y = parseCoordinate(args[1]);
    if (args.length !== 2 || x === null || y === null) {
        return { ok: false, reason: `usage: ${verb} <x> <y>` };
    }
    return { ok: true, action: { kind: verb, x, y } };
}

export function parseDslAction(raw: unknown): Attempt {
    if (typeof raw !== 'string') {
        return { ok: false, reason: 'not a DSL string' };
    }

    const command = raw.trim();
    const [head, ...args] = command.split(/\s+/);
    if (!head) {
        return { ok: false, reason: 'empty command' };
    }
    const verb = head.toLowerCase();

    switch (verb) {
        case 'click':
        case 'double_tap':
            return parsePoint(verb, args);
        case 'long_press': {
            const x = parseCoordinate(args[0]);
            const y = parseCoordinate(args[1]);
            if (x === null || y === null || args.length > 3) {
                return { ok: false, reason: 'usage: long_press <x> <y> [duration_ms]' };
            }
            if (args.length === 2) {
                return { ok: true, action: { kind: 'long_press', x, y } };
            }
            const durationMs = parseDuration(args[2]);
            if (durationMs === null) {
                return { ok: false, reason: 'long_press duration must be a positive integer' };
            }
            return { ok: true, action: { kind: 'long_press', x, y, durationMs } };
        }
        case 'swipe': {
            const coords = args.slice(0, 4).map(parseCoordinate);
            const [x1, y1, x2, y2] = coords;
            if (args.length < 4 || args.length > 5 || x1 == null || y1 == null || x2 == null || y2 == null) {
                return { ok: false, reason: 'usage: swipe <x1> <y1> <x2> <y2> [duration_ms]' };
            }
            const durationMs = args.length === 5 ? parseDuration(args[4]) : DEFAULT_SWIPE_DURATION_MS;
            if (durationMs === null) {
                return { ok: false, reason: 'swipe duration must be a positive integer' };
            }
            return { ok: true, action: { kind: 'swipe', x1, y1, x2, y2, durationMs } };
        }
        case 'text': {
            let value = command.slice(head.length).trim();
            if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
                value = value.slice(1, -1);
            }
            if (!value) {
                return { ok: false, reason: 'usage: text "<value>"' };
            }
            return { ok: true, action: { kind: 'text', value } };
        }
        case 'key': {
            const name = args[0]?.toLowerCase();
            if (args.length !== 1 || !name || !isKeyName(name)) {
                return { ok: false, reason: `usage: key <${KEY_NAMES.join('|')}>` };
            }
            return { ok: true, action: { kind: 'key', name } };
        }
        case 'screenshot':
            return args.length === 0
                ? { ok: true, action: { kind: 'screenshot' } }
                : { ok: false, reason: 'usage: screenshot' };
        case 'scroll': {
            const value = args[0]?.toLowerCase();
            if (args.length !== 1 || !value || !isScrollDirection(value)) {
                return { ok: false, reason: `usage: scroll <${SCROLL_DIRECTIONS.join('|')}>` };
            }
            return { ok: true, action: { kind: 'scroll', direction: value } };
        }
        case 'open_app': {
            const packageName = args[0];
            if (args.length !== 1 || !packageName) {
                return { ok: false, reason: 'usage: open_app <package>' };
            }
            return { ok: true, action: { kind: 'open_app', packageName } };
        }
        case 'wait': {
            const durationMs = parseDuration(args[0]);
            if (args.length !== 1 || durationMs === null) {
                return { ok: false, reason: 'usage: wait <duration_ms>' };
            }
            return { ok: true, action: { kind: 'wait', durationMs } };
        }
        default:
            return { ok: false, reason: `unknown command "${head}"` };
    }
}

function describeInput(raw: unknown): string {
    let text: string;
    try {
        text = typeof raw === 'string' ? raw : JSON.stringify(raw) ?? String(raw);
    } catch {
        text = String(raw);
    }
    return text.length > 200 ? `${text.slice(0, 197)}...` : text;
}

/**
 * Reduce either accepted encoding to a single {@link NormalizedAction}.
 *
 * Structured records are tried first by default; the DSL is the fallback. Only the
 * shape is validated here, screen bounds are checked by whoever executes the action.
 */
export function normalizeAction(raw: unknown, policy: ParsePolicy = 'structured-first'): NormalizedAction {
    const parsers = policy === 'structured-first'
        ? [parseStructuredAction, parseDslAction]
        : [parseDslAction, parseStructuredAction];

    const reasons: string[] = [];
    for (const parse of parsers) {
        const attempt = parse(raw);
        if (attempt.ok) return attempt.action;
        reasons.push(attempt.reason);
    }

    throw new ParseError(`Cannot parse action ${describeInput(raw)} (${reasons.join('; ')})`, raw);
}

/** Canonical DSL spelling of an action, used in logs and trajectory records. */
export function formatAction(action: NormalizedAction): string {
    switch (action.kind) {
        case 'click':
        case 'double_tap':
            return `${action.kind} ${action.x} ${action.y}`;
        case 'long_press':
            return action.durationMs === undefined
                ? `long_press ${action.x} ${action.y}`
                : `long_press ${action.x} ${action.y} ${action.durationMs}`;
        case 'swipe':
            return `swipe ${action.x1} ${action.y1} ${action.x2} ${action.y2} ${action.durationMs}`;
        case 'text':
            return `text "${action.value}"`;
        case 'key':
            return `key ${action.name}`;
        case 'screenshot':
            return 'screenshot';
        case 'scroll':
            return `scroll ${action.direction}`;
        case 'open_app':
            return `open_app ${action.packageName}`;
        case 'wait':
            return `wait ${action.durationMs}`;
    }
}
