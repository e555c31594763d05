/**
 * Text rendering of an override record.
 *
 * All functions are pure: the same inputs always give the same text.
 */

import type { OverrideRecord } from './override_recorder.types';

/** Fixed-width rule delimiting the appendix and log blocks */
export const RULE = '='.repeat(50);

export const APPENDIX_TITLE = '⚠️  VALIDATION OVERRIDE NOTICE';

function bulletSection(title: string, items: readonly string[]): string[] {
  if (items.length === 0) {
    return [];
  }
  return [
    `${title} (${items.length}):`,
    ...items.map((item) => `  • ${item}`),
    '',
  ];
}

/**
 * Builds the block appended to a commit message.
 *
 * The text starts with a newline so it can be concatenated directly after an
 * existing message. ERRORS and WARNINGS sections are omitted when their
 * list is empty.
 *
 * @example
 * buildAppendix('hotfix', ['missing field: user_id'], []);
 * // "\n=====...\n⚠️  VALIDATION OVERRIDE NOTICE\n...VALIDATION ERRORS (1):\n  • missing field: user_id\n..."
 */
export function buildAppendix(
  justification: string,
  errors: readonly string[],
  warnings: readonly string[]
): string {
  return [
    `\n${RULE}`,
    APPENDIX_TITLE,
    RULE,
    '',
    'JUSTIFICATION:',
    `  ${justification}`,
    '',
    ...bulletSection('VALIDATION ERRORS', errors),
    ...bulletSection('VALIDATION WARNINGS', warnings),
    'This commit was pushed despite validation failures.',
    'Review and address these issues in a follow-up commit.',
    RULE,
  ].join('\n');
}

export function buildRecordAppendix(record: OverrideRecord): string {
  return buildAppendix(record.justification, record.errors, record.warnings);
}

/** Message of a dedicated override commit: banner line, blank line, appendix body */
export function buildOverrideCommitMessage(banner: string, appendix: string): string {
  return `${banner}\n${appendix}`;
}

/** Content of the sentinel file committed by the override-commit tier */
export function buildSentinelContent(appendix: string): string {
  return `${appendix.trimStart()}\n`;
}

/** One timestamped block of the append-only override log */
export function buildLogBlock(appendix: string, timestamp: string): string {
  return `\n${RULE}\nTimestamp: ${timestamp}\n${RULE}${appendix}\n`;
}
