import { describe, expect, it } from 'vitest';
import { commandText, formatLiteral } from './command-text.js';

const mill = { path: '.Models.Model.Mill', name: 'Mill' };

describe('formatLiteral', () => {
  it('quotes strings and escapes quotes and backslashes', () => {
    expect(formatLiteral('plain')).toBe('"plain"');
    expect(formatLiteral('say "hi"')).toBe('"say \\"hi\\""');
    expect(formatLiteral('C:\\tmp')).toBe('"C:\\\\tmp"');
  });

  it('renders numbers, booleans, lists and handles', () => {
    expect(formatLiteral(2.5)).toBe('2.5');
    expect(formatLiteral(Number.NaN)).toBe('0');
    expect(formatLiteral(false)).toBe('false');
    expect(formatLiteral([1, 2, 0])).toBe('[1, 2, 0]');
    expect(formatLiteral({ path: '.UserObjects.PartA', name: 'PartA' })).toBe('.UserObjects.PartA');
  });
});

describe('commandText', () => {
  it('builds one command per backend operation', () => {
    const template = { path: '.MaterialFlow.SingleProc', name: 'SingleProc' };
    const frame = { path: '.Models.Model', name: 'Model' };
    const connector = { path: '.MaterialFlow.Connector', name: 'Connector' };
    const buffer = { path: '.Models.Model.Store', name: 'Store' };

    expect(commandText.exists('.MaterialFlow.SingleProc')).toBe('existsObject(.MaterialFlow.SingleProc)');
    expect(commandText.derive(template, frame, 'Mill')).toBe('.MaterialFlow.SingleProc.derive(.Models.Model, "Mill")');
    expect(commandText.setProperty(mill, 'ProcTime', 90)).toBe('.Models.Model.Mill.ProcTime := 90');
    expect(commandText.setProperty(mill, '_3D.Rotation', [90, 0, 0, 1])).toBe(
      '.Models.Model.Mill._3D.Rotation := [90, 0, 0, 1]',
    );
    expect(commandText.connect(connector, mill, buffer)).toBe(
      '.MaterialFlow.Connector.connect(.Models.Model.Mill, .Models.Model.Store)',
    );
  });
});
