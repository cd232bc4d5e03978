/**
 * Check Command
 * 
 * Report whether the external tools can be executed.
 */

import chalk from 'chalk';
import { getBinariesConfig, isBinaryAvailable, type BinaryName } from '@loopcast/core';
import { printError, printHeader, printSuccess, printWarning } from '../lib/output.js';

interface ToolCheck {
  name: BinaryName;
  versionFlag: string;
  required: boolean;
}

const TOOLS: ToolCheck[] = [
  { name: 'ffmpeg', versionFlag: '-version', required: true },
  { name: 'ffprobe', versionFlag: '-version', required: false },
  { name: 'gdown', versionFlag: '--version', required: false },
];

/**
 * @returns 1 when a required tool is missing
 */
export async function checkCommand(): Promise<number> {
  const config = getBinariesConfig();
  let missingRequired = false;

  printHeader('External Tools');

  for (const tool of TOOLS) {
    const binary = config[tool.name];
    const location = chalk.gray(`${binary.resolvedPath} (${binary.source})`);

    if (await isBinaryAvailable(tool.name, tool.versionFlag)) {
      printSuccess(`${tool.name.padEnd(8)} ${location}`);
    } else if (tool.required) {
      missingRequired = true;
      printError(`${tool.name.padEnd(8)} ${location} not executable, set ${binary.envVar}`);
    } else {
      printWarning(`${tool.name.padEnd(8)} ${location} not executable, set ${binary.envVar}`);
    }
  }

  console.log();
  return missingRequired ? 1 : 0;
}
