/**
 * Submitted payload consumed by the generation tasks. Opaque apart from the labels below.
 */
export type JobInput = Record<string, unknown>;

function readString(source: unknown, key: string): string | null {
  if (source && typeof source === 'object' && key in source) {
    const value: unknown = Reflect.get(source, key);
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
  }
  return null;
}

export function isJobInput(value: unknown): value is JobInput {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Company label: company_name, companyName or meta.company_name
 */
export function extractCompanyName(input: JobInput): string | null {
  return (
    readString(input, 'company_name') ??
    readString(input, 'companyName') ??
    readString(input.meta, 'company_name')
  );
}

export function extractIndustry(input: JobInput): string | null {
  return readString(input, 'industry') ?? readString(input.meta, 'industry');
}
