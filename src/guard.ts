/**
 * ChangeGuard: Main API
 *
 * The primary entry point for api-change-guard. Loads two API documents and
 * an optional usage log, then runs the pipeline:
 * resolve baseline/candidate → diff → classify → audit version → sort.
 */

import * as fs from 'fs';
import {
  ChangeGuardOptions,
  ChangeReport,
  ReportFormat,
  SpecInput,
  VersionEvidence,
} from './core/types';
import { InvalidSpecError } from './core/errors';
import { buildSpecDocument, resolvePair } from './core/spec-model';
import { UsageIndex } from './core/usage-index';
import { diffSpecs } from './core/differ';
import { classifyChanges } from './core/classifier';
import { auditVersions } from './core/auditor';
import { formatReport, sortViolations, summarize } from './core/reporter';
import { autoParse, parseUsageLog } from './formats';

// ─── ChangeGuard Class ──────────────────────────────────────────────────────

export class ChangeGuard {
  private escalateOnUsage: boolean;
  private log: (line: string) => void;

  constructor(options: ChangeGuardOptions = {}) {
    this.escalateOnUsage = options.escalateOnUsage ?? true;
    this.log = options.onLog ?? (() => undefined);
  }

  /**
   * Read and model one API document. File-system errors propagate as-is.
   */
  loadSpec(file: string): SpecInput {
    const content = fs.readFileSync(file, 'utf-8');

    let raw: unknown;
    try {
      raw = autoParse(content, file);
    } catch (error) {
      throw new InvalidSpecError(file, error instanceof Error ? error.message : String(error));
    }

    return { file, document: buildSpecDocument(raw, file) };
  }

  /**
   * Build the usage index from a log file. No file means an empty index.
   */
  loadUsage(file?: string): UsageIndex {
    if (file === undefined) return UsageIndex.empty();

    const records = parseUsageLog(fs.readFileSync(file, 'utf-8'), file);
    const index = UsageIndex.fromRecords(records);
    this.log(`usage: ${records.length} record(s), ${index.size} endpoint(s) from ${file}`);
    return index;
  }

  /**
   * Analyze two document files in either order, with an optional usage log.
   */
  analyzeFiles(fileA: string, fileB: string, logsFile?: string): ChangeReport {
    const a = this.loadSpec(fileA);
    const b = this.loadSpec(fileB);
    const usage = this.loadUsage(logsFile);
    return this.analyze(a, b, usage);
  }

  /**
   * Analyze two already-loaded documents. The result does not depend on
   * which one is passed first.
   */
  analyze(a: SpecInput, b: SpecInput, usage: UsageIndex = UsageIndex.empty()): ChangeReport {
    const { baseline, candidate } = resolvePair(a, b);
    this.log(`baseline:  ${baseline.file} (${baseline.document.version})`);
    this.log(`candidate: ${candidate.file} (${candidate.document.version})`);

    const evidence: VersionEvidence = {
      baseline_file: baseline.file,
      candidate_file: candidate.file,
      baseline_version: baseline.document.version,
      candidate_version: candidate.document.version,
    };

    const changes = diffSpecs(baseline.document, candidate.document);
    this.log(`${changes.length} raw change(s)`);

    const ruleViolations = classifyChanges(changes, {
      evidence,
      usage,
      escalateOnUsage: this.escalateOnUsage,
    });
    const audit = auditVersions(changes, ruleViolations, evidence);
    this.log(`version bump: required ${audit.requiredBump}, declared ${audit.actualBump}`);

    const violations = sortViolations(
      audit.violation ? [...ruleViolations, audit.violation] : ruleViolations
    );

    return {
      baseline: { file: baseline.file, version: baseline.document.version },
      candidate: { file: candidate.file, version: candidate.document.version },
      violations,
      requiredBump: audit.requiredBump,
      actualBump: audit.actualBump,
      summary: summarize(violations),
    };
  }

  /**
   * Format a change report.
   */
  format(report: ChangeReport, format: ReportFormat = 'json'): string {
    return formatReport(report, format);
  }
}

/**
 * Analyze two loaded documents without holding on to a ChangeGuard.
 */
export function analyzeDocuments(
  a: SpecInput,
  b: SpecInput,
  usage: UsageIndex = UsageIndex.empty(),
  options: ChangeGuardOptions = {}
): ChangeReport {
  return new ChangeGuard(options).analyze(a, b, usage);
}
