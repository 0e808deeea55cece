/**
 * Content item and collection model.
 *
 * A collection stores `PendingItem`s: the item kind as given by the
 * caller plus its resolved field map. Nothing here is validated at
 * insertion time; `validateItem()` turns a pending item into a member of
 * the closed `ContentItem` union when the collection is compiled.
 *
 * Field schemas live here so the inferred item types and the recognized
 * field lists come from one place.
 */

import { z } from 'zod';

// ============================================================================
// Item kinds
// ============================================================================

export const ITEM_KINDS = [
  'viz',
  'text',
  'image',
  'callout',
  'divider',
  'code',
  'html',
  'metric',
  'layout',
  'pagination',
  'input',
  'sidebar',
] as const;

export type ItemKind = (typeof ITEM_KINDS)[number];

const ITEM_KIND_SET = new Set<string>(ITEM_KINDS);

export function isItemKind(kind: string): kind is ItemKind {
  return ITEM_KIND_SET.has(kind);
}

export const VIZ_TYPES = [
  'bar',
  'stackedbar',
  'stackedbars',
  'timeline',
  'histogram',
  'heatmap',
  'density',
  'boxplot',
  'scatter',
  'pie',
  'treemap',
  'map',
] as const;

export type VizType = (typeof VIZ_TYPES)[number];

export const INPUT_TYPES = ['select', 'checkbox', 'radio', 'slider', 'switch', 'text'] as const;

export type InputType = (typeof INPUT_TYPES)[number];

// ============================================================================
// Collections
// ============================================================================

/** Brand carried by every collection value so nested collections can be recognized. */
export const COLLECTION_BRAND: unique symbol = Symbol('panelwright.collection');

/** A dataset bound to a collection, identified by a content fingerprint. */
export interface DatasetBinding {
  readonly name: string;
  readonly fingerprint: string;
}

/** Resolved field values of a pending item, keyed by field name. */
export type FieldMap = Readonly<Record<string, unknown>>;

/**
 * Builder input for one item. Missing or `undefined` fields are absent,
 * `null` is an explicit unset, anything else is an explicit value.
 */
export interface ItemInput {
  kind: string;
  [field: string]: unknown;
}

export interface PendingItem {
  /** 1-based position assigned at creation, never reused within a collection. */
  readonly insertionIndex: number;
  readonly kind: string;
  /** Fields after defaults resolution. */
  readonly fields: FieldMap;
  /** Fields exactly as the caller gave them, kept so overrides can re-resolve. */
  readonly explicit: FieldMap;
}

export interface Collection {
  readonly [COLLECTION_BRAND]: true;
  readonly items: readonly PendingItem[];
  readonly defaults: FieldMap;
  /** Group segment -> display label. */
  readonly groupLabels: Readonly<Record<string, string>>;
  readonly datasets: Readonly<Record<string, DatasetBinding>>;
  /** Dataset used by items that name none; the first one bound. */
  readonly primaryDataset: string | null;
  readonly nextIndex: number;
}

export function isCollection(value: unknown): value is Collection {
  return typeof value === 'object' && value !== null && COLLECTION_BRAND in value;
}

// ============================================================================
// Field schemas
// ============================================================================

const nullableString = z.string().nullable().default(null);

const choiceValue = z.union([z.string(), z.number()]);

const collectionSchema = z.custom<Collection>(isCollection, {
  message: 'Expected a content collection',
});

/** Fields every kind except pagination breaks recognizes. */
export const CommonFieldsSchema = z.object({
  groupPath: z.union([z.string(), z.array(z.string())]).nullable().default(null),
  title: nullableString,
  filter: nullableString,
  dataset: nullableString,
  visibility: nullableString,
});

export const VizItemSchema = CommonFieldsSchema.extend({
  vizType: z.enum(VIZ_TYPES),
  xVar: nullableString,
  yVar: nullableString,
  stackVar: nullableString,
  groupVar: nullableString,
  valueVar: nullableString,
  xVars: z.array(z.string()).nullable().default(null),
  options: z.record(z.string(), z.unknown()).default({}),
}).strict();

export const TextItemSchema = CommonFieldsSchema.extend({
  text: z.string(),
}).strict();

export const ImageItemSchema = CommonFieldsSchema.extend({
  src: z.string().min(1),
  alt: nullableString,
  caption: nullableString,
}).strict();

export const CalloutItemSchema = CommonFieldsSchema.extend({
  text: z.string(),
  calloutType: z.enum(['note', 'tip', 'warning', 'caution', 'important']).default('note'),
}).strict();

export const DividerItemSchema = CommonFieldsSchema.extend({
  style: z.string().default('default'),
}).strict();

export const CodeItemSchema = CommonFieldsSchema.extend({
  code: z.string(),
  language: z.string().default('text'),
  caption: nullableString,
}).strict();

export const HtmlItemSchema = CommonFieldsSchema.extend({
  html: z.string(),
}).strict();

export const MetricItemSchema = CommonFieldsSchema.extend({
  value: z.union([z.string(), z.number()]),
  subtitle: nullableString,
  icon: nullableString,
}).strict();

export const LayoutItemSchema = CommonFieldsSchema.extend({
  direction: z.enum(['column', 'row']).default('column'),
  children: collectionSchema,
}).strict();

export const PaginationItemSchema = z.object({}).strict();

export const InputItemSchema = CommonFieldsSchema.extend({
  inputId: z.string().regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, 'Must be a variable name'),
  inputType: z.enum(INPUT_TYPES).default('select'),
  choices: z.array(choiceValue).default([]),
  defaultValue: z.union([z.string(), z.number(), z.boolean(), z.array(choiceValue)]).nullable().default(null),
}).strict();

export const SidebarItemSchema = CommonFieldsSchema.extend({
  position: z.enum(['left', 'right']).default('left'),
  children: collectionSchema,
}).strict();

export const ITEM_SCHEMAS = {
  viz: VizItemSchema,
  text: TextItemSchema,
  image: ImageItemSchema,
  callout: CalloutItemSchema,
  divider: DividerItemSchema,
  code: CodeItemSchema,
  html: HtmlItemSchema,
  metric: MetricItemSchema,
  layout: LayoutItemSchema,
  pagination: PaginationItemSchema,
  input: InputItemSchema,
  sidebar: SidebarItemSchema,
} satisfies Record<ItemKind, z.AnyZodObject>;

// ============================================================================
// Validated items
// ============================================================================

type ItemOf<K extends ItemKind, S extends z.ZodTypeAny> = Omit<z.output<S>, 'groupPath'> & {
  kind: K;
  insertionIndex: number;
  groupPath: string[] | null;
};

export type VizItem = ItemOf<'viz', typeof VizItemSchema>;
export type TextItem = ItemOf<'text', typeof TextItemSchema>;
export type ImageItem = ItemOf<'image', typeof ImageItemSchema>;
export type CalloutItem = ItemOf<'callout', typeof CalloutItemSchema>;
export type DividerItem = ItemOf<'divider', typeof DividerItemSchema>;
export type CodeItem = ItemOf<'code', typeof CodeItemSchema>;
export type HtmlItem = ItemOf<'html', typeof HtmlItemSchema>;
export type MetricItem = ItemOf<'metric', typeof MetricItemSchema>;
export type InputItem = ItemOf<'input', typeof InputItemSchema>;

export interface LayoutItem extends Omit<ItemOf<'layout', typeof LayoutItemSchema>, 'children'> {
  children: ContentItem[];
}

export interface SidebarItem extends Omit<ItemOf<'sidebar', typeof SidebarItemSchema>, 'children'> {
  children: ContentItem[];
}

export interface PaginationItem {
  kind: 'pagination';
  insertionIndex: number;
}

export type ContentItem =
  | VizItem
  | TextItem
  | ImageItem
  | CalloutItem
  | DividerItem
  | CodeItem
  | HtmlItem
  | MetricItem
  | LayoutItem
  | PaginationItem
  | InputItem
  | SidebarItem;

/** Items that carry the common fields (everything but pagination breaks). */
export type ContentBlock = Exclude<ContentItem, PaginationItem>;

export function isPaginationBreak(item: { kind: string }): boolean {
  return item.kind === 'pagination';
}

export function isContentBlock(item: ContentItem): item is ContentBlock {
  return item.kind !== 'pagination';
}
