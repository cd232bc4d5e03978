/**
 * Binary Configuration
 * 
 * Centralized configuration for all external binary paths.
 * Supports both Windows and Linux binaries with automatic OS detection.
 * 
 * Priority order:
 * 1. Environment variables (e.g., FFMPEG_PATH)
 * 2. Custom binary folder (packages/core/binaries/)
 * 3. System PATH
 */

import { spawn } from 'node:child_process';
import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(): string {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'bundled' | 'path';
}

/**
 * All supported binaries
 */
export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
  gdown: BinaryConfig;
}

export type BinaryName = keyof BinariesConfig;

/**
 * Resolve binary path with priority:
 * 1. Environment variable
 * 2. Custom binary folder
 * 3. System PATH
 */
function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }
  
  const customPath = join(BINARY_ROOT, getOsFolder(), name + getExeExt());
  if (existsSync(customPath)) {
    return { name, envVar, resolvedPath: customPath, source: 'bundled' };
  }
  
  // Let the system PATH resolve it; a missing tool fails at spawn time
  return { name, envVar, resolvedPath: name, source: 'path' };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
    gdown: resolveBinaryPath('gdown', 'GDOWN_PATH', env),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

/**
 * Get a specific binary path
 */
export function getBinaryPath(name: BinaryName): string {
  return binaries()[name].resolvedPath;
}

/**
 * Check if a binary can be executed
 */
export async function isBinaryAvailable(
  name: BinaryName,
  versionFlag: string = '-version'
): Promise<boolean> {
  const binaryPath = getBinaryPath(name);
  
  return new Promise((resolve) => {
    try {
      const proc = spawn(binaryPath, [versionFlag], {
        stdio: 'ignore',
        timeout: 5000,
      });
      
      proc.on('close', (code) => {
        resolve(code === 0);
      });
      
      proc.on('error', () => {
        resolve(false);
      });
    } catch {
      resolve(false);
    }
  });
}
