/**
 * Minimal protocol an ordered object container needs from the widget that
 * displays its children.
 */
export interface WidgetContainer<W> {
  iterWidgets(): Iterable<W>;
  /** Inserts at `index`, or appends when `index` is undefined. */
  addWidget(widget: W, index?: number): void;
  removeWidget(widget: W): void;
  clearWidgets(): void;
  readonly focusedWidget: W | undefined;
  /** Setting an index outside the container throws SKEIN_NOT_FOUND. */
  get focusPosition(): number | null;
  set focusPosition(position: number | null);
}
