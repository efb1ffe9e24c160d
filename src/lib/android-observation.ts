import type { Orientation, ScreenSize, UiElement } from '@/types';

const XML_ENTITIES: Record<string, string> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&apos;': "'",
    '&#39;': "'",
};

function decodeXml(value: string): string {
    return value
        .replace(/&#(\d+);/g, (entity, code: string) => {
            if (entity === '&#39;') return "'";
            return String.fromCodePoint(Number.parseInt(code, 10));
        })
        .replace(/&(amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

function parseAttributes(tag: string): Map<string, string> {
    const attributes = new Map<string, string>();
    for (const match of tag.matchAll(/([\w:-]+)="([^"]*)"/g)) {
        attributes.set(match[1], decodeXml(match[2]));
    }
    return attributes;
}

function parseBounds(value: string | undefined): UiElement['bounds'] | null {
    const match = value?.match(/^\[(\d+),(\d+)\]\[(\d+),(\d+)\]$/);
    if (!match) return null;
    return [Number(match[1]), Number(match[2]), Number(match[3]), Number(match[4])];
}

/** Flattens a `uiautomator dump` document into its nodes, in document order. */
export function parseUiHierarchy(xml: string): UiElement[] {
    const elements: UiElement[] = [];
    for (const match of xml.matchAll(/<node\b([^>]*?)\/?>/g)) {
        const attributes = parseAttributes(match[1]);
        const bounds = parseBounds(attributes.get('bounds'));
        if (!bounds) continue;

        elements.push({
            bounds,
            text: attributes.get('text') ?? '',
            resourceId: attributes.get('resource-id') ?? '',
            className: attributes.get('class') ?? '',
            contentDesc: attributes.get('content-desc') ?? '',
            clickable: attributes.get('clickable') === 'true',
        });
    }
    return elements;
}

export function parseCurrentActivity(dumpsysWindow: string): string | null {
    const lines = dumpsysWindow.split('\n');
    const focusLines = [
        ...lines.filter((line) => line.includes('mCurrentFocus')),
        ...lines.filter((line) => line.includes('mFocusedApp')),
    ];

    for (const line of focusLines) {
        const match = line.match(/([\w.]+\/[\w.$]+)/);
        if (match) return match[1];
    }
    return null;
}

/** `wm size` prints the physical size and, when set, an override that wins. */
export function parseScreenSize(wmSize: string): ScreenSize | null {
    const override = wmSize.match(/Override size:\s*(\d+)x(\d+)/);
    const match = override ?? wmSize.match(/(\d+)x(\d+)/);
    if (!match) return null;
    return { width: Number(match[1]), height: Number(match[2]) };
}

/** Reads `SurfaceOrientation` from `dumpsys input`; 1 and 3 are the rotated states. */
export function parseSurfaceOrientation(dumpsysInput: string): 0 | 1 | 2 | 3 | null {
    const match = dumpsysInput.match(/SurfaceOrientation:\s*(\d)/);
    if (!match) return null;
    const value = Number(match[1]);
    return value === 0 || value === 1 || value === 2 || value === 3 ? value : null;
}

export function resolveOrientation(naturalSize: ScreenSize, rotation: 0 | 1 | 2 | 3 | null): {
    screenSize: ScreenSize;
    orientation: Orientation;
} {
    const rotated = rotation === 1 || rotation === 3;
    const screenSize = rotated
        ? { width: naturalSize.height, height: naturalSize.width }
        : naturalSize;
    return {
        screenSize,
        orientation: screenSize.width > screenSize.height ? 'landscape' : 'portrait',
    };
}
