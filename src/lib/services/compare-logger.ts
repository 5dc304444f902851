/**
 * Comparison Pipeline Logger
 *
 * One trace per document pair. Each stage logs a single compact line.
 *
 * STAGES (canonical order):
 *   PARSE → EXTRACT → SEGMENT → DIFF → REVIEW → SUMMARY
 *
 * LOG LEVELS:
 *   INFO  = Stage summaries
 *   DEBUG = Per-row / per-part details (gated by DEBUG_COMPARE)
 *   WARN  = Fallback, skipped row or table, unreadable document
 *   ERROR = Review call failed
 */

import crypto from 'crypto';

export type CompareStage =
  | 'PARSE'
  | 'EXTRACT'
  | 'SEGMENT'
  | 'DIFF'
  | 'REVIEW'
  | 'SUMMARY';

export type LogLevel = 'INFO' | 'DEBUG' | 'WARN' | 'ERROR';

interface StageData {
  // What came in
  input?: number | string;
  // What went out
  output?: number | string;
  // Why this path was taken
  decision?: string;
  // Additional context
  [key: string]: unknown;
}

export interface TraceSummary {
  traceId: string;
  stages: {
    extract?: { reference: number; presentation: number };
    diff?: { ghosts: number };
    review?: { model: string; latencyMs: number; ok: boolean };
  };
  status: 'match' | 'ghosts' | 'error';
  totalLatencyMs: number;
}

class CompareLogger {
  private traceId: string = '';
  private startTime: number = 0;
  private debugEnabled: boolean = false;
  private summary: TraceSummary = CompareLogger.emptySummary('');

  private static emptySummary(traceId: string): TraceSummary {
    return { traceId, stages: {}, status: 'match', totalLatencyMs: 0 };
  }

  /**
   * Start a new trace for a document pair.
   */
  startTrace(reference: string, presentation: string): string {
    this.traceId = crypto.randomUUID().slice(0, 8);
    this.startTime = Date.now();
    this.debugEnabled = process.env.DEBUG_COMPARE === 'true';
    this.summary = CompareLogger.emptySummary(this.traceId);

    this.info('PARSE', { reference, presentation });
    return this.traceId;
  }

  info(stage: CompareStage, data?: StageData): void {
    this.log('INFO', stage, data);
  }

  /**
   * Log at DEBUG level (gated by DEBUG_COMPARE)
   */
  debug(stage: CompareStage, data?: StageData): void {
    if (this.debugEnabled) {
      this.log('DEBUG', stage, data);
    }
  }

  warn(stage: CompareStage, data?: StageData): void {
    this.log('WARN', stage, data);
  }

  error(stage: CompareStage, data?: StageData): void {
    this.log('ERROR', stage, data);
    this.summary.status = 'error';
  }

  private log(level: LogLevel, stage: CompareStage, data?: StageData): void {
    const prefix = `[CMP:${this.traceId || '-'}][${stage}]`;

    if (!data) {
      console.log(prefix);
      return;
    }

    const parts: string[] = [];

    if (data.input !== undefined) parts.push(`in=${data.input}`);
    if (data.output !== undefined) parts.push(`out=${data.output}`);
    if (data.decision !== undefined) parts.push(`→ ${data.decision}`);

    for (const [key, value] of Object.entries(data)) {
      if (!['input', 'output', 'decision'].includes(key)) {
        if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
          parts.push(`${key}=${value}`);
        }
      }
    }

    const message = parts.join(' ');

    if (level === 'WARN') {
      console.warn(`${prefix} ${message}`);
    } else if (level === 'ERROR') {
      console.error(`${prefix} ${message}`);
    } else {
      console.log(`${prefix} ${message}`);
    }
  }

  // ============================================
  // STAGE-SPECIFIC HELPERS
  // ============================================

  extract(kind: 'reference' | 'presentation', fragments: number, segments: number): void {
    this.info('EXTRACT', { kind, output: fragments });
    this.info('SEGMENT', { kind, output: segments });
    const current = this.summary.stages.extract ?? { reference: 0, presentation: 0 };
    this.summary.stages.extract = { ...current, [kind]: segments };
  }

  diff(reference: number, presentation: number, ghosts: number): void {
    this.info('DIFF', { reference, presentation, output: ghosts });
    this.summary.stages.diff = { ghosts };
    this.summary.status = ghosts === 0 ? 'match' : 'ghosts';
  }

  review(model: string, latencyMs: number, ok: boolean): void {
    const data = { model, latencyMs: `${latencyMs}ms`, ok };
    if (ok) {
      this.info('REVIEW', data);
    } else {
      this.error('REVIEW', data);
    }
    this.summary.stages.review = { model, latencyMs, ok };
  }

  /**
   * End the trace with a one-line summary.
   */
  endTrace(): TraceSummary {
    const totalLatencyMs = Date.now() - this.startTime;
    this.summary.totalLatencyMs = totalLatencyMs;

    const s = this.summary.stages;
    const parts: string[] = [];

    if (s.extract) parts.push(`reference=${s.extract.reference}`, `presentation=${s.extract.presentation}`);
    if (s.diff) parts.push(`ghosts=${s.diff.ghosts}`);
    if (s.review) parts.push(`review=${s.review.ok ? 'ok' : 'failed'}`);
    parts.push(`latency=${totalLatencyMs}ms`);

    console.log(`[CMP:${this.traceId}][SUMMARY] ${parts.join(' | ')} → ${this.summary.status}`);

    return { ...this.summary, stages: { ...this.summary.stages } };
  }
}

// Singleton instance
export const compareLogger = new CompareLogger();

export { CompareLogger };
