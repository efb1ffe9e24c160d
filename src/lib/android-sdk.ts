import { accessSync, constants, existsSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export type AndroidTool = 'adb' | 'emulator';

const TOOL_RELATIVE_PATHS: Record<AndroidTool, string[]> = {
    adb: ['platform-tools', 'adb'],
    emulator: ['emulator', 'emulator'],
};

const TOOL_ENV_OVERRIDES: Record<AndroidTool, string> = {
    adb: 'ADB_PATH',
    emulator: 'EMULATOR_PATH',
};

function executableName(baseName: string): string {
    return process.platform === 'win32' ? `${baseName}.exe` : baseName;
}

function getSdkRootCandidates(env: NodeJS.ProcessEnv): string[] {
    const home = os.homedir();
    const candidates = [
        env.ANDROID_HOME,
        env.ANDROID_SDK_ROOT,
        path.join(home, 'Library', 'Android', 'sdk'),
        path.join(home, 'Android', 'Sdk'),
        '/opt/android-sdk',
        '/usr/lib/android-sdk',
    ];
    return candidates.filter((value): value is string => Boolean(value && value.trim().length > 0));
}

export function resolveAndroidSdkRoot(env: NodeJS.ProcessEnv = process.env): string | null {
    return getSdkRootCandidates(env).find((candidate) => existsSync(candidate)) ?? null;
}

/**
 * Absolute path of an SDK tool when one can be found, otherwise the bare executable
 * name so the lookup falls through to PATH.
 */
export function resolveAndroidToolPath(tool: AndroidTool, env: NodeJS.ProcessEnv = process.env): string {
    const override = env[TOOL_ENV_OVERRIDES[tool]]?.trim();
    if (override) {
        return override;
    }

    const sdkRoot = resolveAndroidSdkRoot(env);
    if (!sdkRoot) {
        return executableName(tool);
    }

    const relative = TOOL_RELATIVE_PATHS[tool];
    const segments = [...relative.slice(0, -1), executableName(relative[relative.length - 1])];
    const resolved = path.join(sdkRoot, ...segments);
    return existsSync(resolved) ? resolved : executableName(tool);
}

function isExecutableFile(filePath: string): boolean {
    if (!existsSync(filePath)) {
        return false;
    }

    try {
        accessSync(filePath, constants.X_OK);
        return true;
    } catch {
        return process.platform === 'win32';
    }
}

function isExecutableInPath(command: string, env: NodeJS.ProcessEnv): boolean {
    const pathValue = env.PATH;
    if (!pathValue) {
        return false;
    }

    return pathValue
        .split(path.delimiter)
        .filter(Boolean)
        .some((dir) => isExecutableFile(path.join(dir, command)));
}

export function isAndroidToolAvailable(tool: AndroidTool, env: NodeJS.ProcessEnv = process.env): boolean {
    const toolPath = resolveAndroidToolPath(tool, env);
    if (path.isAbsolute(toolPath) || toolPath.includes('/') || toolPath.includes('\\')) {
        return isExecutableFile(toolPath);
    }
    return isExecutableInPath(toolPath, env);
}

export function getAndroidSdkSetupHint(): string {
    return 'adb is not available. Install the Android SDK platform tools and put `adb` in PATH, or set ADB_PATH, ANDROID_HOME or ANDROID_SDK_ROOT.';
}
