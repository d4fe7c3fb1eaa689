#!/usr/bin/env node

import * as path from 'node:path';
import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import {
  FindingCategory,
  Priority,
  Severity,
  type AnalysisHistoryEntry,
  type AnalysisResult,
  type ProfileStatistics,
  type UserProfile,
} from './types';
import { AnalysisEngine } from './engine/analysis-engine';
import { normalizeLanguageTag } from './parser/languages';
import { FileProfileStore } from './profile/file-profile-store';
import { loadConfig } from './utils/config';
import { describeError, InvalidInputError } from './utils/errors';
import logger, { addFileTransport, setLogLevel } from './utils/logger';

interface CommonOptions {
  store?: string;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  logDir?: string;
}

interface AnalyzeOptions extends CommonOptions {
  language?: string;
  user?: string;
}

interface HistoryOptions extends CommonOptions {
  limit?: string;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug(`Could not read package version: ${describeError(error)}`);
  }
  return '0.0.0';
}

function setup(opts: CommonOptions): AnalysisEngine {
  if (opts.verbose) setLogLevel('debug');
  if (opts.logDir) addFileTransport(opts.logDir);

  const baseDir = path.resolve(opts.config ?? process.cwd());
  const config = loadConfig(baseDir);
  const storageDir = path.resolve(baseDir, opts.store ?? config.profile.storageDir);
  return new AnalysisEngine({ config, store: new FileProfileStore(storageDir) });
}

function fail(message: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  process.exitCode = 1;
}

// ─── Program ─────────────────────────────────────────────────────────────────

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stylewise')
    .description('Static code analysis with per-user style profiles and ranked recommendations')
    .version(readVersion());

  const withCommonOptions = (command: Command): Command =>
    command
      .option('--store <dir>', 'Profile storage directory (relative to the config directory)')
      .option('--config <dir>', 'Directory holding stylewise.config.yaml', process.cwd())
      .option('--json', 'Print machine-readable JSON', false)
      .option('--log-dir <dir>', 'Also write JSON logs under <dir>/.stylewise/logs')
      .option('-v, --verbose', 'Verbose logging', false);

  // ─── stylewise analyze ──────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('analyze')
      .description('Analyze a source file')
      .argument('<file>', 'Source file to analyze')
      .option('-l, --language <language>', 'Language tag (detected from the extension or content when omitted)')
      .option('-u, --user <user>', 'Identity whose style profile is updated'),
  ).action(async (file: string, opts: AnalyzeOptions) => {
    const filePath = path.resolve(file);
    if (!fs.existsSync(filePath)) {
      fail(`File not found: ${filePath}`);
      return;
    }

    const engine = setup(opts);
    const code = fs.readFileSync(filePath, 'utf-8');
    const language = opts.language ?? normalizeLanguageTag(path.extname(filePath).slice(1)) ?? '';
    const spinner = ora({ text: `Analyzing ${path.basename(filePath)}`, isEnabled: !opts.json && process.stderr.isTTY });
    spinner.start();

    let result: AnalysisResult;
    try {
      result = await engine.analyze(code, language, opts.user);
    } catch (error) {
      spinner.fail(chalk.red('Analysis failed'));
      fail(error instanceof InvalidInputError ? error.issues.map((issue) => issue.message).join('; ') : describeError(error));
      return;
    }
    spinner.stop();

    if (opts.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printAnalysisResult(path.basename(filePath), result);
    }
  });

  // ─── stylewise profile ──────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('profile')
      .description('Show the stored style profile of a user')
      .argument('<user>', 'User identity'),
  ).action(async (user: string, opts: CommonOptions) => {
    const engine = setup(opts);
    const profile = await engine.getProfile(user);
    if (!profile) {
      fail(`No profile for "${user}"`);
      return;
    }
    if (opts.json) console.log(JSON.stringify(profile, null, 2));
    else printProfile(profile);
  });

  // ─── stylewise stats ────────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('stats')
      .description('Show aggregate statistics for a user')
      .argument('<user>', 'User identity'),
  ).action(async (user: string, opts: CommonOptions) => {
    const engine = setup(opts);
    const stats = await engine.getStatistics(user);
    if (!stats) {
      fail(`No profile for "${user}"`);
      return;
    }
    if (opts.json) console.log(JSON.stringify(stats, null, 2));
    else printStatistics(stats);
  });

  // ─── stylewise history ──────────────────────────────────────────────────

  withCommonOptions(
    program
      .command('history')
      .description('List recent analyses of a user, newest first')
      .argument('<user>', 'User identity')
      .option('-n, --limit <n>', 'Number of entries to show', '10'),
  ).action(async (user: string, opts: HistoryOptions) => {
    const limit = Number.parseInt(opts.limit ?? '10', 10);
    if (!Number.isInteger(limit) || limit < 0) {
      fail(`Invalid --limit: ${opts.limit ?? ''}`);
      return;
    }
    const engine = setup(opts);
    const history = await engine.getHistory(user, limit);
    if (opts.json) console.log(JSON.stringify(history, null, 2));
    else printHistory(user, history);
  });

  return program;
}

// ─── Output ──────────────────────────────────────────────────────────────────

function priorityColor(priority: Priority): (text: string) => string {
  if (priority === Priority.HIGH) return chalk.red;
  return priority === Priority.MEDIUM ? chalk.yellow : chalk.gray;
}

function scoreColor(score: number): (text: string) => string {
  if (score >= 80) return chalk.green;
  return score >= 50 ? chalk.yellow : chalk.red;
}

function lineRef(line: number | undefined): string {
  return line === undefined ? '' : chalk.gray(`:${line}`);
}

function printAnalysisResult(fileName: string, result: AnalysisResult): void {
  const { metrics } = result;
  console.log(chalk.bold.cyan(`\n${fileName}`) + chalk.gray(` (${result.language}, ${result.parseMode} parse)`));
  console.log(`  Quality score: ${scoreColor(result.qualityScore)(String(result.qualityScore))}/100`);
  console.log(
    chalk.gray(
      `  ${metrics.linesOfCode} lines, ${metrics.numFunctions} functions, ${metrics.numClasses} classes, ` +
        `complexity ${metrics.complexity}, docs ${Math.round(metrics.docstringCoverage * 100)}%`,
    ),
  );

  for (const notice of result.notices) {
    console.log(chalk.yellow(`  ! ${notice.message}`));
  }

  const { bugPatterns, codeSmells, securityIssues } = result.patterns;
  if (bugPatterns.length + codeSmells.length + securityIssues.length > 0) {
    console.log(chalk.bold('\nFindings:'));
    for (const bug of bugPatterns) {
      const color = bug.severity === Severity.ERROR ? chalk.red : bug.severity === Severity.WARNING ? chalk.yellow : chalk.gray;
      console.log(`  ${color(bug.severity.padEnd(8))} ${bug.type}${lineRef(bug.span?.startLine)}  ${bug.message}`);
    }
    for (const issue of securityIssues) {
      console.log(`  ${chalk.red('security'.padEnd(8))} ${issue.type}${lineRef(issue.span?.startLine)}  ${issue.message}`);
    }
    for (const smell of codeSmells) {
      console.log(`  ${chalk.cyan('smell'.padEnd(8))} ${smell.type}${lineRef(smell.span?.startLine)}  ${smell.message}`);
    }
  }

  if (result.recommendations.length === 0) {
    console.log(chalk.green('\nNo recommendations: the code looks clean.\n'));
    return;
  }
  console.log(chalk.bold('\nRecommendations:'));
  for (const recommendation of result.recommendations) {
    const color = priorityColor(recommendation.priority);
    console.log(
      `  ${color(recommendation.priority.padEnd(6))} ${chalk.bold(recommendation.title)} ` +
        chalk.gray(`(${Math.round(recommendation.confidence * 100)}%)`),
    );
    console.log(chalk.gray(`         ${recommendation.description}`));
  }
  console.log();
}

function printProfile(profile: UserProfile): void {
  const { style } = profile;
  console.log(chalk.bold.cyan(`\nProfile: ${profile.userId}`));
  console.log(`  Analyses:          ${profile.totalAnalyses}`);
  console.log(`  Favorite language: ${profile.favoriteLanguage || chalk.gray('none')}`);
  console.log(`  Naming:            ${style.naming.dominant ?? chalk.gray('undetermined')}`);
  console.log(`  Quotes:            ${style.quoteStyle.dominant ?? chalk.gray('undetermined')}`);
  console.log(
    `  Indentation:       ${style.indentation.unitWidth.toFixed(1)} ` +
      chalk.gray(`(${Math.round(style.indentation.consistencyRatio * 100)}% consistent)`),
  );
  console.log(`  Blank lines/def:   ${style.spacing.avgBlankLinesBetweenDefs.toFixed(1)}`);
  console.log(`  Updated:           ${profile.updatedAt}\n`);
}

function printStatistics(stats: ProfileStatistics): void {
  console.log(chalk.bold.cyan(`\nStatistics: ${stats.userId}`));
  console.log(`  Analyses:        ${stats.totalAnalyses}`);
  console.log(`  Lines analyzed:  ${stats.totalLines}`);
  console.log(`  Average quality: ${scoreColor(stats.averageQualityScore)(stats.averageQualityScore.toFixed(1))}`);
  console.log(`  Languages:       ${Object.entries(stats.languages).map(([lang, n]) => `${lang} (${n})`).join(', ')}`);
  if (stats.topFindingTypes.length > 0) {
    console.log(chalk.bold('\n  Recurring findings:'));
    for (const { type, count } of stats.topFindingTypes) {
      console.log(`    ${chalk.cyan('•')} ${type} ${chalk.gray(`x${count}`)}`);
    }
  }
  console.log();
}

function printHistory(user: string, history: AnalysisHistoryEntry[]): void {
  if (history.length === 0) {
    console.log(chalk.yellow(`\nNo analyses recorded for "${user}".\n`));
    return;
  }
  console.log(chalk.bold.cyan(`\nHistory: ${user}`));
  for (const entry of history) {
    const counts = entry.findingCounts;
    console.log(
      `  ${chalk.gray(entry.analyzedAt)}  ${entry.language.padEnd(10)} ` +
        `${scoreColor(entry.qualityScore)(String(entry.qualityScore).padStart(3))}  ` +
        chalk.gray(`${entry.linesOfCode} lines, ${counts[FindingCategory.BUG_PATTERN]} bugs, ${counts[FindingCategory.CODE_SMELL]} smells, ` +
            `${counts[FindingCategory.SECURITY_ISSUE]} security`),
    );
  }
  console.log();
}

// ─── Entry point ─────────────────────────────────────────────────────────────

export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

if (require.main === module) {
  process.on('SIGINT', () => {
    console.log(chalk.yellow('\nInterrupted.'));
    process.exit(130);
  });

  main().catch((error: unknown) => {
    logger.error(`Unexpected failure: ${describeError(error)}`);
    process.exitCode = 1;
  });
}
