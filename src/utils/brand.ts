/**
 * Branding helpers shared by the logger and the CLI banner.
 *
 * The mark colour indicates the message type:
 * - Cyan: headers and banner
 * - Green: success
 * - Yellow: warnings
 * - Red: errors
 */

import chalk from 'chalk';

export const BRAND_MARK = '🔁';

export const brand = {
  banner: () => chalk.cyan(BRAND_MARK),
  success: () => chalk.green(BRAND_MARK),
  warning: () => chalk.yellow(BRAND_MARK),
  error: () => chalk.red(BRAND_MARK),
  plain: () => BRAND_MARK,
} as const;

/**
 * Format a message with the coloured mark and the [cyclewatch] prefix.
 */
export function brandMessage(type: keyof typeof brand, message: string): string {
  return `${brand[type]()} [cyclewatch] ${message}`;
}

export function renderBanner(): string {
  return [
    `${brand.banner()} ${chalk.cyan('cyclewatch')}: the universal build-run watcher. Change it. Build it. Run it. Repeat.`,
    'Example:',
    `  cyclewatch --root=./myapp --depfile=go.mod --depcommand="go mod tidy && go mod download" --build="go build -o myapp ." --run="./myapp" --include=.go --exclude=.git,tmp`,
    '',
  ].join('\n');
}
