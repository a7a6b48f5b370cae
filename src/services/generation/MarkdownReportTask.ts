import type { ArtifactType } from '../../domain/entities/ReportArtifact.js';
import { extractCompanyName, extractIndustry } from '../../domain/entities/JobInput.js';
import type { JobInput } from '../../domain/entities/JobInput.js';
import type { GeneratedDocument, GenerationContext, GenerationTask } from './GenerationTask.js';

type SectionFilter = (key: string, value: unknown) => boolean;

const COMPLIANCE_KEYS = /complian|regulat|risk|security|privacy|policy|governance|audit/i;

function renderValue(value: unknown, depth: number): string[] {
  const indent = '  '.repeat(depth);
  if (Array.isArray(value)) {
    return value.flatMap((item) =>
      item && typeof item === 'object'
        ? [`${indent}-`, ...renderValue(item, depth + 1)]
        : [`${indent}- ${String(item)}`]
    );
  }
  if (value && typeof value === 'object') {
    return Object.entries(value).flatMap(([key, nested]) =>
      nested && typeof nested === 'object'
        ? [`${indent}- **${key}**`, ...renderValue(nested, depth + 1)]
        : [`${indent}- **${key}**: ${String(nested)}`]
    );
  }
  return [`${indent}${String(value)}`];
}

/**
 * Renders the payload sections a report type cares about as a Markdown document
 */
export class MarkdownReportTask implements GenerationTask {
  constructor(
    readonly type: ArtifactType,
    private title: string,
    private includeSection: SectionFilter,
    private clock: () => Date = () => new Date()
  ) {}

  async generate(input: JobInput, context: GenerationContext): Promise<GeneratedDocument> {
    if (context.signal.aborted) {
      throw new Error(`${this.title} generation aborted`);
    }

    const companyName = extractCompanyName(input);
    const industry = extractIndustry(input);
    const generatedAt = this.clock().toISOString();
    const sections = Object.entries(input).filter(([key, value]) => this.includeSection(key, value));

    if (sections.length === 0) {
      throw new Error(`No input sections available for the ${this.type} report`);
    }

    const lines = [
      `# ${this.title}${companyName ? `: ${companyName}` : ''}`,
      '',
      `Generated: ${generatedAt}`,
      ...(industry ? [`Industry: ${industry}`] : []),
      `Job: ${context.jobId}`,
    ];
    for (const [key, value] of sections) {
      lines.push('', `## ${key}`, '', ...renderValue(value, 0));
    }

    return {
      body: Buffer.from(`${lines.join('\n')}\n`, 'utf-8'),
      contentType: 'text/markdown; charset=utf-8',
      extension: 'md',
      metadata: {
        companyName: companyName ?? 'customer',
        ...(industry ? { industry } : {}),
        generatedAt,
        sectionCount: sections.length,
      },
    };
  }
}

/**
 * Built-in executive, technical and compliance reports
 */
export function createDefaultGenerationTasks(clock?: () => Date): GenerationTask[] {
  const isObject = (value: unknown) => value !== null && typeof value === 'object';
  return [
    new MarkdownReportTask('executive', 'Executive Report', (key) => key !== 'meta', clock),
    new MarkdownReportTask('technical', 'Technical Report', (_key, value) => isObject(value), clock),
    new MarkdownReportTask(
      'compliance',
      'Compliance Report',
      (key, value) => COMPLIANCE_KEYS.test(key) || (isObject(value) && COMPLIANCE_KEYS.test(JSON.stringify(value))),
      clock
    ),
  ];
}
