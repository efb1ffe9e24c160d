export const KEY_NAMES = [
    'back',
    'home',
    'enter',
    'power',
    'menu',
    'delete',
    'recents',
    'volume_up',
    'volume_down',
    'tab',
    'escape',
    'search',
] as const;

export type KeyName = typeof KEY_NAMES[number];

export const SCROLL_DIRECTIONS = ['up', 'down', 'left', 'right'] as const;

export type ScrollDirection = typeof SCROLL_DIRECTIONS[number];

export const DEFAULT_SWIPE_DURATION_MS = 300;
export const DEFAULT_WAIT_DURATION_MS = 1000;

export type NormalizedAction =
    | { kind: 'click'; x: number; y: number }
    | { kind: 'double_tap'; x: number; y: number }
    | { kind: 'long_press'; x: number; y: number; durationMs?: number }
    | { kind: 'swipe'; x1: number; y1: number; x2: number; y2: number; durationMs: number }
    | { kind: 'text'; value: string }
    | { kind: 'key'; name: KeyName }
    | { kind: 'screenshot' }
    | { kind: 'scroll'; direction: ScrollDirection }
    | { kind: 'open_app'; packageName: string }
    | { kind: 'wait'; durationMs: number };

export type ActionKind = NormalizedAction['kind'];

/** Order in which the two accepted encodings are tried. */
export type ParsePolicy = 'structured-first' | 'dsl-first';
