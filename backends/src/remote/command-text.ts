import { isObjectHandle, type ObjectHandle, type PropertyValue } from '@layoutsmith/core';

/**
 * Renders a property value in the engine's scripting syntax. Handles render
 * as their path, number lists as `[a, b, c]`.
 */
export function formatLiteral(value: PropertyValue): string {
  if (typeof value === 'string') {
    return quote(value);
  }
  if (typeof value === 'number') {
    return formatNumber(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (isObjectHandle(value)) {
    return value.path;
  }
  return `[${value.map(formatNumber).join(', ')}]`;
}

export function quote(text: string): string {
  return `"${text.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatNumber(value: number): string {
  return Number.isFinite(value) ? String(value) : '0';
}

export const commandText = {
  exists: (path: string) => `existsObject(${path})`,
  derive: (template: ObjectHandle, parent: ObjectHandle, name: string) =>
    `${template.path}.derive(${parent.path}, ${quote(name)})`,
  setProperty: (handle: ObjectHandle, path: string, value: PropertyValue) =>
    `${handle.path}.${path} := ${formatLiteral(value)}`,
  connect: (connector: ObjectHandle, from: ObjectHandle, to: ObjectHandle) =>
    `${connector.path}.connect(${from.path}, ${to.path})`,
};
