/**
 * Typed builder helpers, one per item kind.
 *
 * Each is a thin wrapper over `add()` that fixes the `kind` and types the
 * fields. Omitted fields are resolved from the collection defaults; pass
 * `null` to leave a field explicitly unset.
 */

import type { Collection, InputType, VizType } from '../types/content.js';
import { add } from './collection.js';

export interface CommonInput {
  /** Slash-delimited string ("demographics/age") or segment array. */
  groupPath?: string | string[] | null;
  title?: string | null;
  /** Row-filter expression applied to the item's dataset. */
  filter?: string | null;
  dataset?: string | null;
  /** Visibility condition, e.g. `region == "north" & wave >= 2`. */
  visibility?: string | null;
}

export interface VizInput extends CommonInput {
  vizType: VizType;
  xVar?: string | null;
  yVar?: string | null;
  stackVar?: string | null;
  groupVar?: string | null;
  valueVar?: string | null;
  xVars?: string[] | null;
  /** Backend style options, passed through untouched. */
  options?: Record<string, unknown>;
}

export interface ImageInput extends CommonInput {
  src: string;
  alt?: string | null;
  caption?: string | null;
}

export interface CalloutInput extends CommonInput {
  calloutType?: 'note' | 'tip' | 'warning' | 'caution' | 'important';
}

export interface CodeInput extends CommonInput {
  language?: string;
  caption?: string | null;
}

export interface MetricInput extends CommonInput {
  value: string | number;
  subtitle?: string | null;
  icon?: string | null;
}

export interface InputControlInput extends CommonInput {
  inputId: string;
  inputType?: InputType;
  choices?: (string | number)[];
  defaultValue?: string | number | boolean | (string | number)[] | null;
}

export function addViz(collection: Collection, input: VizInput): Collection {
  return add(collection, { kind: 'viz', ...input });
}

export function addText(collection: Collection, text: string, input: CommonInput = {}): Collection {
  return add(collection, { kind: 'text', ...input, text });
}

export function addImage(collection: Collection, input: ImageInput): Collection {
  return add(collection, { kind: 'image', ...input });
}

export function addCallout(collection: Collection, text: string, input: CalloutInput = {}): Collection {
  return add(collection, { kind: 'callout', ...input, text });
}

export function addDivider(collection: Collection, style?: string): Collection {
  return add(collection, { kind: 'divider', style });
}

export function addCode(collection: Collection, code: string, input: CodeInput = {}): Collection {
  return add(collection, { kind: 'code', ...input, code });
}

export function addHtml(collection: Collection, html: string, input: CommonInput = {}): Collection {
  return add(collection, { kind: 'html', ...input, html });
}

export function addMetric(collection: Collection, input: MetricInput): Collection {
  return add(collection, { kind: 'metric', ...input });
}

/**
 * Add an input control. Its `inputId` is the variable name visibility
 * conditions refer to.
 */
export function addInput(collection: Collection, input: InputControlInput): Collection {
  return add(collection, { kind: 'input', ...input });
}

/**
 * Add a row or column block holding the items of `children`.
 */
export function addLayout(
  collection: Collection,
  direction: 'column' | 'row',
  children: Collection,
  input: CommonInput = {},
): Collection {
  return add(collection, { kind: 'layout', ...input, direction, children });
}

export function addSidebar(
  collection: Collection,
  children: Collection,
  input: CommonInput & { position?: 'left' | 'right' } = {},
): Collection {
  return add(collection, { kind: 'sidebar', ...input, children });
}
