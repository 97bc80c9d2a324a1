import chalk from 'chalk';

/** Debug logger gated by PROVISION_DEBUG (`*` or a namespace prefix) */
export function debug(namespace: string, ...args: unknown[]): void {
  const filter = process.env.PROVISION_DEBUG ?? '';
  if (!filter) return;
  if (filter === '*' || namespace.startsWith(filter.replace('*', ''))) {
    console.error(chalk.dim(`[DEBUG] [${namespace}]`), ...args);
  }
}
