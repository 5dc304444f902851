import 'dotenv/config';
import { readFile } from 'fs/promises';
import path from 'path';
import { parseArgs } from 'util';

import type { DocumentInput } from '@/lib/core/types';
import { compareDocuments } from '@/lib/services/comparison-service';
import { compareLogger } from '@/lib/services/compare-logger';
import { configService } from '@/lib/services/config';
import { reviewGhostSegments } from '@/lib/services/review/review-service';
import { formatComparison, formatGhostList, formatReview } from '@/lib/services/report-formatter';
import { assertValid, handleError } from '@/lib/utils/errors';

const USAGE = `Usage: ghost-check <reference.docx> <presentation.pptx> [options]

Options:
  --review           Ask the review model to judge each unmatched segment
  --show-segments    Print the raw list of unmatched segments
  --json             Print the full report as JSON
  --api-key <key>    Review API key (defaults to LLM_API_KEY / DASHSCOPE_API_KEY)
  -h, --help         Show this message`;

async function loadInput(filePath: string): Promise<DocumentInput> {
  return {
    filename: path.basename(filePath),
    buffer: await readFile(filePath),
  };
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      review: { type: 'boolean', default: false },
      'show-segments': { type: 'boolean', default: false },
      json: { type: 'boolean', default: false },
      'api-key': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  assertValid(positionals.length === 2, `Expected two files.\n\n${USAGE}`);
  const [referencePath, presentationPath] = positionals;

  const report = await compareDocuments(await loadInput(referencePath), await loadInput(presentationPath));

  const review =
    values.review && report.ghostSegments.length > 0
      ? await reviewGhostSegments({
          apiKey: values['api-key'] ?? configService.getLLMConfig().apiKey,
          referenceText: report.reference.mergedText,
          ghostSegments: report.ghostSegments,
        })
      : undefined;

  const summary = compareLogger.endTrace();

  if (values.json) {
    console.log(
      JSON.stringify(
        {
          traceId: summary.traceId,
          status: report.status,
          ghostSegments: report.ghostSegments,
          parseErrors: report.parseErrors.map((error) => ({ code: error.code, message: error.message })),
          reference: { filename: report.reference.filename, segments: report.reference.segments.size, diagnostics: report.reference.diagnostics },
          presentation: { filename: report.presentation.filename, segments: report.presentation.segments.size, diagnostics: report.presentation.diagnostics },
          review,
        },
        null,
        2
      )
    );
    return 0;
  }

  const lines = formatComparison(report);
  if (review) lines.push('', ...formatReview(review));
  if (values['show-segments'] && report.ghostSegments.length > 0) {
    lines.push('', ...formatGhostList(report.ghostSegments));
  }
  console.log(lines.join('\n'));
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    handleError(error, 'ghost-check');
    process.exitCode = 1;
  });
