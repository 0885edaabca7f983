import { describe, it, expect } from 'vitest';
import {
  DuplicateFieldError,
  InvalidFieldNameError,
  InvalidReferenceTagError
} from '@cfgsheet/core';
import { buildTableSchema, exportedFields } from '../src';
import { ITEM_COLUMNS, buildContext, issueCodes, itemsTable, table } from '../../../tests/helpers';

describe('buildTableSchema', () => {
  it('detects the key policy and keeps data rows with sheet numbering', () => {
    const schema = buildTableSchema(itemsTable(), buildContext());
    expect(schema.keyPolicy).toEqual({ kind: 'single-int', keyField: 'id' });
    expect(schema.rows.map((r) => r.row)).toEqual([7, 8]);
    expect(exportedFields(schema).map((f) => f.actualName)).toEqual(['name', 'hp', 'tags', 'pos']);
  });

  it('skips blank rows and warns about values past the last column', () => {
    const ctx = buildContext();
    const input = table('Items', [{ name: 'id', type: 'int' }, { name: 'hp', type: 'int' }], [
      [1, 5],
      [null, '  '],
      [2, 6, 'stray']
    ]);
    const schema = buildTableSchema(input, ctx);

    expect(schema.rows).toEqual([{ row: 7, cells: [1, 5] }, { row: 9, cells: [2, 6] }]);
    expect(issueCodes(ctx.diagnostics)).toEqual(['CFG_BLANK_ROW', 'CFG_ROW_TRUNCATED']);
    expect(ctx.diagnostics.issues[1].row).toBe(9);
  });

  it('reports an empty table without failing', () => {
    const ctx = buildContext();
    buildTableSchema(table('Items', ITEM_COLUMNS), ctx);
    expect(issueCodes(ctx.diagnostics)).toEqual(['CFG_EMPTY_TABLE']);
  });

  it('rejects duplicate field names', () => {
    const input = table('Items', [{ name: 'id', type: 'int' }, { name: 'hp', type: 'int' }, { name: 'hp', type: 'float' }]);
    expect(() => buildTableSchema(input, buildContext())).toThrow(DuplicateFieldError);
    expect(() => buildTableSchema(input, buildContext())).toThrow('Duplicate field names in Items: hp');
  });

  it('rejects names that collide once tags are stripped', () => {
    const input = table('Items', [{ name: 'id', type: 'int' }, { name: 'owner', type: 'int' }, { name: '[Heroes]owner', type: 'int' }]);
    expect(() => buildTableSchema(input, buildContext())).toThrow('Duplicate field names in Items: owner');
  });

  it.each([
    ['max-hp', 'illegal-characters'],
    ['class', 'reserved-word'],
    ['id', 'id is reserved for the record key']
  ])('rejects field name %j', (name, reason) => {
    const input = table('Items', [{ name: 'code', type: 'int' }, { name, type: 'int' }]);
    expect(() => buildTableSchema(input, buildContext())).toThrow(InvalidFieldNameError);
    expect(() => buildTableSchema(input, buildContext())).toThrow(reason);
  });

  it('reports a second id column as a duplicate before the reserved name', () => {
    const input = table('Items', [{ name: 'id', type: 'int' }, { name: 'id', type: 'int' }]);
    expect(() => buildTableSchema(input, buildContext())).toThrow(DuplicateFieldError);
    expect(() => buildTableSchema(input, buildContext())).toThrow('Duplicate field names in Items: id');
  });

  it('allows odd names on ignored columns', () => {
    const input = table('Items', [{ name: 'id', type: 'int' }, { name: 'my note', type: 'string', label: 'ignore' }]);
    expect(() => buildTableSchema(input, buildContext())).not.toThrow();
  });

  it('rejects reference tags on dict and custom types', () => {
    const input = table('Items', [{ name: 'id', type: 'int' }, { name: '[Shops]stock', type: 'dict(int,int)' }]);
    expect(() => buildTableSchema(input, buildContext())).toThrow(InvalidReferenceTagError);
  });
});
