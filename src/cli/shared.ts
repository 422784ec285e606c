import chalk from 'chalk';
import { brandMessage } from '../utils/brand.js';

export const exitWithError = (message: string, code = 1): never => {
  console.error(chalk.red(brandMessage('error', message)));
  process.exit(code);
};
