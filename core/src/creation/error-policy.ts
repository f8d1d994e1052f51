import type { ErrorHandlingRules, ErrorPolicyCategory } from '../config/mapping-rules.js';
import { RuntimeErrorCode, createRuntimeError, type Diagnostic } from '../errors/index.js';
import type { Logger } from '../logger.js';

/**
 * Applies the configured policy to a recorded creation incident. The caller
 * has already counted and recorded it; this only decides whether to log or
 * to stop the run.
 *
 * @throws LayoutsmithError R010 when the category's policy is `error_and_stop`
 */
export function enforceErrorPolicy(
  policies: ErrorHandlingRules,
  category: ErrorPolicyCategory,
  incident: Diagnostic,
  logger: Partial<Logger>,
): void {
  const policy = policies[category];
  if (policy === 'error_and_stop') {
    throw createRuntimeError(
      RuntimeErrorCode.CREATION_STOPPED,
      `Creation stopped on ${category} error: ${incident.message}`,
      { subject: incident.subject, details: { category, code: incident.code } },
    );
  }
  if (policy === 'warn_and_continue') {
    logger.warn?.(`creation.${category}.failed`, {
      code: incident.code,
      message: incident.message,
      ...incident.subject,
    });
  }
}
