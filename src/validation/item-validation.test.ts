import { describe, it, expect } from 'vitest';
import { checkDatasetReferences, validateItem, validateItems } from './item-validation.js';
import { ValidationError } from './errors.js';
import { add, addPaginationBreak, bindDataset, newCollection } from '../collection/collection.js';
import { addImage, addLayout, addSidebar, addText, addViz } from '../collection/helpers.js';
import type { Collection } from '../types/content.js';

function catchValidation(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error('expected a ValidationError');
}

function only(collection: Collection) {
  return validateItem(collection.items[0]);
}

describe('validateItem', () => {
  it('returns a typed item with its group path split', () => {
    const item = only(addViz(newCollection(), { vizType: 'timeline', yVar: 'value', groupPath: ' demo / age /trend ' }));

    expect(item.kind).toBe('viz');
    if (item.kind === 'viz') {
      expect(item.groupPath).toEqual(['demo', 'age', 'trend']);
      expect(item.yVar).toBe('value');
      expect(item.insertionIndex).toBe(1);
    }
  });

  it('rejects an unknown kind', () => {
    const err = catchValidation(() => only(add(newCollection(), { kind: 'chart' })));

    expect(err.message).toBe(
      'Item 1: unknown item kind "chart". Known kinds: viz, text, image, callout, divider, code, html, ' +
      'metric, layout, pagination, input, sidebar',
    );
    expect(err.field).toBe('kind');
    expect(err.insertionIndex).toBe(1);
  });

  it('names a missing required field', () => {
    const err = catchValidation(() => only(add(newCollection(), { kind: 'viz', xVar: 'age' })));

    expect(err.field).toBe('vizType');
    expect(err.message).toBe('Item 1 (viz): vizType: Required');
  });

  it('names an unrecognized field', () => {
    const err = catchValidation(() => only(add(newCollection(), { kind: 'divider', colour: 'red' })));

    expect(err.field).toBe('colour');
    expect(err.message).toBe('Item 1 (divider): unrecognized field(s) "colour"');
  });

  it('rejects a group path without segments', () => {
    const err = catchValidation(() => only(addText(newCollection(), 'x', { groupPath: ' / / ' })));

    expect(err.field).toBe('groupPath');
    expect(err.message).toBe('Item 1: groupPath " / / " has no segments');
  });

  it('validates layout children', () => {
    const children = addText(addText(newCollection(), 'a'), 'b');
    const item = only(addLayout(newCollection(), 'row', children));

    expect(item.kind === 'layout' && item.children.map((c) => c.kind)).toEqual(['text', 'text']);
    expect(item.kind === 'layout' && item.direction).toBe('row');
  });

  it('reports a child error under its parent', () => {
    const children = addImage(newCollection(), { src: '' });
    const err = catchValidation(() => only(addSidebar(newCollection(), children)));

    expect(err.field).toBe('children.src');
    expect(err.message).toBe(
      'Item 1 (sidebar) > Item 1 (image): src: String must contain at least 1 character(s)',
    );
  });

  it('rejects nested pagination breaks', () => {
    const children = addPaginationBreak(addText(newCollection(), 'a'));
    const err = catchValidation(() => only(addLayout(newCollection(), 'column', children)));

    expect(err.message).toBe('Item 1 (layout): pagination breaks cannot be nested (child 2)');
  });

  it('rejects fields on a pagination break', () => {
    const err = catchValidation(() => only(add(newCollection(), { kind: 'pagination', title: 'x' })));

    expect(err.field).toBe('title');
  });
});

describe('validateItems', () => {
  it('validates in order and stops at the first invalid item', () => {
    let c = addText(newCollection(), 'fine');
    c = add(c, { kind: 'nope' });
    c = add(c, { kind: 'also-nope' });

    expect(() => validateItems(c.items)).toThrow('Item 2: unknown item kind "nope"');
  });
});

describe('checkDatasetReferences', () => {
  it('accepts any dataset name when none is bound', () => {
    const items = validateItems(addText(newCollection(), 'x', { dataset: 'anything' }).items);

    expect(() => checkDatasetReferences(items, {})).not.toThrow();
  });

  it('rejects a dataset that is not bound', () => {
    const c = addViz(bindDataset(newCollection(), 'survey', { fingerprint: 'fp' }), {
      vizType: 'pie',
      xVar: 'q1',
      dataset: 'other',
    });

    expect(() => checkDatasetReferences(validateItems(c.items), c.datasets)).toThrow(
      'Item 1 (viz): dataset "other" is not bound. Available datasets: survey',
    );
  });

  it('checks layout children', () => {
    const children = addText(newCollection(), 'x', { dataset: 'other' });
    const c = addLayout(bindDataset(newCollection(), 'survey', { fingerprint: 'fp' }), 'row', children);

    expect(() => checkDatasetReferences(validateItems(c.items), c.datasets)).toThrow(ValidationError);
  });
});
