import type { CampaignJob, JobValidateFn } from '@cadencekit/core';

function fieldValue(job: CampaignJob, field: string): string {
  const value = job.payload[field];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

/** Skip jobs where any of `fields` is missing or blank. */
export function requiredFields(...fields: string[]): JobValidateFn {
  return (job) => {
    const missing = fields.filter((field) => fieldValue(job, field) === '');
    return missing.length > 0 ? `missing required field: ${missing.join(', ')}` : null;
  };
}

/** Skip jobs where `field` is present but does not match `pattern`. */
export function fieldPattern(field: string, pattern: RegExp, description: string): JobValidateFn {
  return (job) => {
    const value = fieldValue(job, field);
    return value !== '' && !pattern.test(value) ? `${field} is not ${description}` : null;
  };
}

/** First skip reason of `validators`, in order. */
export function composeValidators(...validators: JobValidateFn[]): JobValidateFn {
  return (job) => {
    for (const validate of validators) {
      const reason = validate(job);
      if (reason !== null) return reason;
    }
    return null;
  };
}
