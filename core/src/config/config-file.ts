import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';
import { parse as parseYaml } from 'yaml';
import { RuntimeErrorCode, createRuntimeError, describeError } from '../errors/index.js';

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });

/** Directory holding the default YAML configuration shipped with the package. */
export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../../config/', import.meta.url));

export interface ConfigValidator<T> {
  readonly schemaFile: string;
  /** Narrows `data` to T; violations are left on `errors`. */
  check(data: unknown): data is T;
  errors(): ErrorObject[];
}

/**
 * Wraps the JSON schema stored under config/schemas. The schema is read and
 * compiled on first use.
 */
export function createConfigValidator<T>(schemaFile: string): ConfigValidator<T> {
  let compiled: ValidateFunction<T> | undefined;

  const load = (): ValidateFunction<T> => {
    if (compiled) {
      return compiled;
    }
    const schemaPath = fileURLToPath(new URL(`../../config/schemas/${schemaFile}`, import.meta.url));
    try {
      compiled = ajv.compile<T>(JSON.parse(readFileSync(schemaPath, 'utf8')));
    } catch (error) {
      throw createRuntimeError(
        RuntimeErrorCode.CONFIG_LOAD_FAILED,
        `Invalid configuration schema ${schemaFile}: ${describeError(error)}`,
        { cause: error },
      );
    }
    return compiled;
  };

  return {
    schemaFile,
    check: (data: unknown): data is T => load()(data),
    errors: () => load().errors ?? [],
  };
}

/**
 * Parses YAML text and checks it against a configuration schema.
 *
 * @throws LayoutsmithError R001 listing every schema violation
 */
export function parseConfigText<T>(text: string, validator: ConfigValidator<T>, source: string): T {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw createRuntimeError(
      RuntimeErrorCode.INVALID_CONFIGURATION,
      `Configuration at ${source} is not valid YAML: ${describeError(error)}`,
      { cause: error },
    );
  }

  if (!validator.check(raw)) {
    const violations = formatAjvErrors(validator.errors());
    throw createRuntimeError(
      RuntimeErrorCode.INVALID_CONFIGURATION,
      `Configuration at ${source} is invalid:\n${violations.map((line) => `  - ${line}`).join('\n')}`,
      { details: { violations } },
    );
  }
  return raw;
}

export async function readConfigFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    throw createRuntimeError(
      RuntimeErrorCode.CONFIG_LOAD_FAILED,
      `Unable to read configuration file ${filePath}: ${describeError(error)}`,
      { cause: error },
    );
  }
}

function formatAjvErrors(errors: ErrorObject[]): string[] {
  return errors.map((error) => {
    const location = error.instancePath || '/';
    return `${location} ${error.message ?? 'is invalid'}`;
  });
}
