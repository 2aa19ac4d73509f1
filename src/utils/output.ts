/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat } from '../types.js';
import type { ProvisionResult } from '../reconcilers/agents/types.js';
import type { PermissionSummary } from '../reconcilers/permissions/types.js';
import type { BatchProvisionResult } from '../reconcilers/clusters/types.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // stderr keeps --json output on stdout parseable
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}

/**
 * One-line tally, e.g. "2/3 databases (1 failed)"
 */
export function formatPermissionSummary(summary: PermissionSummary): string {
  const parts = [`${summary.succeeded}/${summary.total} databases`];
  if (summary.failed > 0) parts.push(`${summary.failed} failed`);
  if (summary.skipped > 0) parts.push(`${summary.skipped} skipped`);
  return parts.length > 1 ? `${parts[0]} (${parts.slice(1).join(', ')})` : parts[0];
}

/**
 * Print what an operation did to one agent
 */
export function printProvisionResult(result: ProvisionResult, format: OutputFormat): void {
  if (format === 'json') {
    return;
  }

  console.log(chalk.bold(`\nAgent: ${result.agentName}`));
  console.log(`  ${chalk.gray('ACL:')}  ${result.acl.name} (uid ${result.acl.uid})`);
  console.log(`  ${chalk.gray('Role:')} ${result.role.name} (uid ${result.role.uid})`);
  console.log(
    `  ${chalk.gray('User:')} ${result.user ? `${result.user.name} (uid ${result.user.uid})` : chalk.gray('(none)')}`
  );

  if (result.deleted.length > 0) {
    console.log(`  ${chalk.gray('Deleted:')} ${chalk.red(result.deleted.join(', '))}`);
  }
  if (result.created.length > 0) {
    console.log(`  ${chalk.gray('Created:')} ${chalk.green(result.created.join(', '))}`);
  }
  if (result.adopted.length > 0) {
    console.log(`  ${chalk.gray('Adopted:')} ${chalk.yellow(result.adopted.join(', '))}`);
  }

  const permissions = result.permissions;
  if (!permissions) {
    console.log(`  ${chalk.gray('Databases:')} skipped`);
    return;
  }
  console.log(`  ${chalk.gray('Databases:')} ${formatPermissionSummary(permissions)}`);
  for (const db of permissions.databases) {
    const icon =
      db.status === 'succeeded' ? chalk.green('✓') : db.status === 'failed' ? chalk.red('✗') : chalk.gray('-');
    const detail = db.error ? chalk.red(` ${db.error}`) : '';
    console.log(`    ${icon} ${db.name} ${chalk.gray(`(${db.action})`)}${detail}`);
  }
}

/**
 * Print per-cluster outcomes of a multi-cluster run
 */
export function printBatchResult(result: BatchProvisionResult, format: OutputFormat): void {
  if (format === 'json') {
    return;
  }

  header('Multi-cluster Summary');
  for (const cluster of result.clusters) {
    if (cluster.success) {
      console.log(chalk.green('✓'), `${cluster.name} ${chalk.gray(cluster.endpoint)}`);
    } else {
      console.log(chalk.red('✗'), `${cluster.name} ${chalk.gray(cluster.endpoint)}: ${cluster.error ?? 'failed'}`);
    }
  }
}
