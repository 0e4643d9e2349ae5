/**
 * packages/core/src/widgets/objectContainer.ts — 1:1 mapping between business
 * objects and the widgets that display them, kept sorted by a key function.
 *
 * The container owns every widget in the wrapped WidgetContainer. Order is
 * (key, insertion sequence): items with equal keys keep the order in which
 * they were added. Keys are recomputed on demand, so call updateOrder() after
 * a key changes.
 */

import { SkeinError } from "../errors.js";
import { type KeyFunction, type SortKey, compareKeys } from "./sortKey.js";
import type { WidgetContainer } from "./widgetContainer.js";

export type ObjectContainerOptions<T, W> = Readonly<{
  container: WidgetContainer<W>;
  createWidget: (item: T) => W;
  /** Defaults to a constant key, i.e. insertion order. */
  keyFunction?: KeyFunction<T>;
  /** Runs after a widget is created and again whenever the key function changes. */
  prepareWidget?: (widget: W, item: T) => void;
  refreshWidget?: (widget: W) => void;
}>;

type Entry<T, W> = Readonly<{ item: T; widget: W; seq: number }>;

const constantKey: KeyFunction<unknown> = () => 0;

export class ObjectContainer<T, W> {
  readonly container: WidgetContainer<W>;
  private readonly createWidget: (item: T) => W;
  private readonly prepareWidget: ((widget: W, item: T) => void) | undefined;
  private readonly refreshWidget: ((widget: W) => void) | undefined;
  private readonly byItem = new Map<T, Entry<T, W>>();
  private readonly byWidget = new Map<W, Entry<T, W>>();
  private currentKeyFunction: KeyFunction<T>;
  private nextSeq = 0;

  constructor(opts: ObjectContainerOptions<T, W>) {
    this.container = opts.container;
    this.createWidget = opts.createWidget;
    this.prepareWidget = opts.prepareWidget;
    this.refreshWidget = opts.refreshWidget;
    this.currentKeyFunction = opts.keyFunction ?? constantKey;
  }

  get size(): number {
    return this.byItem.size;
  }

  get keyFunction(): KeyFunction<T> {
    return this.currentKeyFunction;
  }

  set keyFunction(value: KeyFunction<T>) {
    if (value === this.currentKeyFunction) return;
    this.currentKeyFunction = value;
    for (const widget of this.container.iterWidgets()) {
      const entry = this.entryForWidget(widget);
      this.prepareWidget?.(widget, entry.item);
    }
    this.updateOrder();
  }

  /** Returns the widget for `item`, creating and inserting it when absent. */
  addItem(item: T): W {
    const existing = this.byItem.get(item);
    if (existing !== undefined) return existing.widget;

    const widget = this.createWidget(item);
    const entry: Entry<T, W> = Object.freeze({ item, widget, seq: this.nextSeq++ });
    this.prepareWidget?.(widget, item);
    // Mappings are recorded only once the widget is displayed.
    this.container.addWidget(widget, this.insertionIndexFor(entry));
    this.byItem.set(item, entry);
    this.byWidget.set(widget, entry);
    return widget;
  }

  /** Removes the item and returns its widget. Throws SKEIN_NOT_FOUND when absent. */
  removeItem(item: T): W {
    const entry = this.byItem.get(item);
    if (entry === undefined) {
      throw new SkeinError("SKEIN_NOT_FOUND", "removeItem: item is not in the container");
    }
    this.container.removeWidget(entry.widget);
    this.byItem.delete(item);
    this.byWidget.delete(entry.widget);
    return entry.widget;
  }

  containsItem(item: T): boolean {
    return this.byItem.has(item);
  }

  getWidgetForItem(item: T, createIfMissing = false): W | undefined {
    const entry = this.byItem.get(item);
    if (entry !== undefined) return entry.widget;
    return createIfMissing ? this.addItem(item) : undefined;
  }

  getItemForWidget(widget: W): T | undefined {
    return this.byWidget.get(widget)?.item;
  }

  /** Refreshes the item's widget; returns false when there is no widget to refresh. */
  refreshItem(item: T, createIfMissing = false): boolean {
    const widget = this.getWidgetForItem(item, createIfMissing);
    if (widget === undefined) return false;
    this.refreshWidget?.(widget);
    return true;
  }

  clear(): void {
    this.byItem.clear();
    this.byWidget.clear();
    this.container.clearWidgets();
  }

  /** Items in display order. */
  items(): T[] {
    const result: T[] = [];
    for (const widget of this.container.iterWidgets()) {
      result.push(this.entryForWidget(widget).item);
    }
    return result;
  }

  get selectedItem(): T | undefined {
    const widget = this.container.focusedWidget;
    return widget === undefined ? undefined : this.getItemForWidget(widget);
  }

  /**
   * Re-sorts the container after keys changed. Focus stays on the widget that
   * had it; every widget is refreshed afterwards.
   */
  updateOrder(): void {
    const focused = this.container.focusedWidget;
    const entries = [...this.container.iterWidgets()].map((widget) => this.entryForWidget(widget));
    const keyed = entries.map((entry) => ({ entry, key: this.currentKeyFunction(entry.item) }));
    keyed.sort((a, b) => compareKeys(a.key, b.key) || a.entry.seq - b.entry.seq);

    this.container.clearWidgets();
    for (const { entry } of keyed) this.container.addWidget(entry.widget);

    if (focused !== undefined) {
      const index = keyed.findIndex(({ entry }) => entry.widget === focused);
      if (index >= 0) this.container.focusPosition = index;
    }
    if (this.refreshWidget !== undefined) {
      for (const { entry } of keyed) this.refreshWidget(entry.widget);
    }
  }

  private insertionIndexFor(entry: Entry<T, W>): number | undefined {
    const key: SortKey = this.currentKeyFunction(entry.item);
    let index = 0;
    for (const widget of this.container.iterWidgets()) {
      if (widget !== entry.widget) {
        const existing = this.entryForWidget(widget);
        const cmp = compareKeys(this.currentKeyFunction(existing.item), key) || existing.seq - entry.seq;
        if (cmp > 0) return index;
      }
      index++;
    }
    return undefined;
  }

  private entryForWidget(widget: W): Entry<T, W> {
    const entry = this.byWidget.get(widget);
    if (entry === undefined) {
      throw new SkeinError("SKEIN_NOT_FOUND", "widget is not managed by this container");
    }
    return entry;
  }
}
