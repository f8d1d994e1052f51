import type { DataType, ScalarValue } from '../config/mapping-rules.js';
import { MappingErrorCode, createDiagnostic, type Diagnostic, type DiagnosticSubject } from '../errors/index.js';
import { parseNumber } from '../ir/index.js';

/**
 * Coerces text (or an already converted number) to the rule's data type.
 * Integers truncate; unparsable numbers become 0.
 */
export function coerceValue(value: string | number, dataType: DataType | undefined): ScalarValue {
  switch (dataType) {
    case 'int':
    case 'positive_int':
      return Math.trunc(toNumber(value)) || 0;
    case 'float':
    case 'positive_float':
      return toNumber(value);
    default:
      return String(value);
  }
}

function toNumber(value: string | number): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }
  return parseNumber(value) ?? 0;
}

export function isNumericType(dataType: DataType | undefined): boolean {
  return dataType !== undefined && dataType !== 'string';
}

/**
 * Checks sign and range of a coerced value. Returns undefined when the value
 * may be emitted.
 */
export function checkValue(
  sourceName: string,
  value: ScalarValue,
  dataType: DataType | undefined,
  ranges: Readonly<Record<string, readonly [number, number]>>,
  subject: DiagnosticSubject,
): Diagnostic | undefined {
  if (typeof value !== 'number' || !isNumericType(dataType)) {
    return undefined;
  }
  if ((dataType === 'positive_int' || dataType === 'positive_float') && value < 0) {
    return createDiagnostic(
      MappingErrorCode.INVALID_DATA_TYPE,
      `Invalid data type for ${sourceName}. Expected ${dataType}, got ${value}`,
      subject,
    );
  }
  const range = ranges[sourceName.toLowerCase()];
  if (range) {
    const [min, max] = range;
    if (value < min || value > max) {
      return createDiagnostic(
        MappingErrorCode.VALUE_OUT_OF_RANGE,
        `${sourceName} value ${value} outside valid range [${min}, ${max}]`,
        subject,
      );
    }
  }
  return undefined;
}
