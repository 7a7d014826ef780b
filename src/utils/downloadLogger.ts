import path from 'path';
import { bold, cyan, dim, green, magenta, red, yellow, blue } from 'colorette';
import type { CompletionOutcome } from '../types/download';
import type { RelocationResult } from '../types/reconcile';

const MAX_NAME_PREVIEW = 8;

const numberFormatter = new Intl.NumberFormat('en-US');

const coerceBoolean = (value: unknown): boolean => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalised = value.trim().toLowerCase();
    return ['1', 'true', 't', 'yes', 'y', 'on'].includes(normalised);
  }
  return false;
};

const isProductionBuild = () => {
  if (process.env.DEBUG_PROD === 'true') {
    return false;
  }
  return process.env.NODE_ENV === 'production';
};

const isVerboseEnabled = () => coerceBoolean(process.env.HARVEST_LOG_VERBOSE) && !isProductionBuild();

const shouldLogErrors = () => !isProductionBuild();

const timestamp = () => dim(new Date().toISOString());

const formatDuration = (durationMs: number) => `${(durationMs / 1000).toFixed(durationMs >= 10000 ? 1 : 2)} s`;

const formatNumber = (value: number) => numberFormatter.format(value);

const previewNames = (names: Iterable<string>) => {
  const all = [...names];
  if (all.length === 0) return '—';
  const shown = all.slice(0, MAX_NAME_PREVIEW).join(', ');
  return all.length > MAX_NAME_PREVIEW ? `${shown} … +${formatNumber(all.length - MAX_NAME_PREVIEW)} more` : shown;
};

const prefix = () => cyan('⬇️ [Verify]');

const emit = (header: string, details: string[] = []) => {
  console.log(`${timestamp()} ${header}`);
  details.forEach((detail) => {
    console.log(`   ${detail}`);
  });
};

const emitError = (header: string, details: string[] = []) => {
  const lines = [`${timestamp()} ${header}`];
  details.forEach((detail) => {
    lines.push(...detail.split('\n').map((line) => `   ${line}`));
  });
  lines.forEach((line) => console.error(line));
};

export const logVerifyStart = (directory: string, baseline: Iterable<string>, timeoutMs: number) => {
  if (!isVerboseEnabled()) return;
  emit(`${prefix()} ${blue('Waiting for download')} ${dim(`in ${directory}`)}`, [
    `Baseline: ${previewNames(baseline)}`,
    `Timeout: ${formatDuration(timeoutMs)}`,
  ]);
};

export const logScan = (info: { rawNew: string[]; completed: string[]; elapsedMs: number }) => {
  if (!isVerboseEnabled()) return;
  if (info.rawNew.length === 0) {
    emit(`${prefix()} ${dim(`Still waiting for a new file (${formatDuration(info.elapsedMs)} elapsed)`)}`);
    return;
  }
  emit(`${prefix()} ${yellow('New entries')}`, [
    `All new: ${previewNames(info.rawNew)}`,
    `Without partial suffixes: ${previewNames(info.completed)}`,
  ]);
};

export const logUnreadableCandidate = (name: string) => {
  if (!isVerboseEnabled()) return;
  emit(`${prefix()} ${yellow('Could not stat candidate, skipping this tick')} ${bold(name)}`);
};

export const logCandidate = (candidatePath: string, candidateCount: number) => {
  if (!isVerboseEnabled()) return;
  emit(`${prefix()} ${magenta('Top candidate')} ${bold(path.basename(candidatePath))}`, [
    `Candidates considered: ${formatNumber(candidateCount)}`,
  ]);
};

export const logStabilityReading = (info: {
  candidatePath: string;
  size: number | null;
  streak: number;
  required: number;
  attempt: number;
  maxAttempts: number;
}) => {
  if (!isVerboseEnabled()) return;
  const name = path.basename(info.candidatePath);
  const size = info.size === null ? red('unreadable') : `${formatNumber(info.size)} bytes`;
  emit(
    `${prefix()} ${dim(`check ${info.attempt}/${info.maxAttempts}`)} ${name} ${size} ${dim(`stable ${info.streak}/${info.required}`)}`,
  );
};

export const logVerifyResult = (outcome: CompletionOutcome) => {
  if (!isVerboseEnabled()) return;
  if (outcome.status === 'completed') {
    emit(`${prefix()} ${green('Download complete and stable')} ${bold(path.basename(outcome.filePath))}`, [
      `Waited: ${formatDuration(outcome.elapsedMs)}`,
    ]);
    return;
  }
  const details = [`Phase: ${outcome.phase}`, `Waited: ${formatDuration(outcome.elapsedMs)}`];
  if (outcome.candidatePath) {
    details.push(`Unsettled candidate: ${outcome.candidatePath}`);
  }
  emit(`${prefix()} ${red('Timed out')}`, details);
};

export const logRelocation = (result: RelocationResult) => {
  if (!isVerboseEnabled()) return;
  const ok = result.failed.length === 0;
  const header = `${cyan('📦 [Reconcile]')} ${ok ? green('Moved') : yellow('Moved with failures')} ${bold(
    formatNumber(result.moved.length),
  )} ${dim(`${result.sourceDir} → ${result.destinationDir}`)}`;
  const details = result.moved.map((entry) => `${path.basename(entry.from)} → ${entry.to}`);
  result.failed.forEach((entry) => {
    details.push(`${red('failed')} ${path.basename(entry.from)}: ${entry.error}`);
  });
  emit(header, details);
};

export interface DownloadErrorInfo {
  url?: string;
  stage?: 'image' | 'file' | 'relocate' | 'record' | 'model' | 'unknown';
  filePath?: string;
}

export const logDownloadError = (error: unknown, info: DownloadErrorInfo = {}) => {
  if (!shouldLogErrors()) return;
  const err = error instanceof Error ? error : new Error(typeof error === 'string' ? error : 'Unknown download error');
  const header = `${red('☠️ [Harvest]')} ${red('Download flow error')} ${info.url ? dim(`(${info.url})`) : ''}`.trim();
  const details: string[] = [];
  if (info.stage) {
    details.push(`Stage: ${info.stage}`);
  }
  if (info.filePath) {
    details.push(`Path: ${info.filePath}`);
  }
  details.push(err.stack ?? err.message);
  emitError(header, details);
};
