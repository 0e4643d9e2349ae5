/**
 * Array-backed widget container with a focus cursor.
 *
 * Focus follows the focused widget across inserts and removals. Removing the
 * focused widget moves focus to the widget that took its place, or to the new
 * last widget when it was at the end.
 */

import { SkeinError } from "../errors.js";
import type { WidgetContainer } from "./widgetContainer.js";

export class FocusList<W> implements WidgetContainer<W> {
  private readonly widgets: W[] = [];
  private focusIndex: number | null = null;

  get length(): number {
    return this.widgets.length;
  }

  iterWidgets(): readonly W[] {
    return this.widgets.slice();
  }

  widgetAt(index: number): W | undefined {
    return this.widgets[index];
  }

  indexOf(widget: W): number {
    return this.widgets.indexOf(widget);
  }

  addWidget(widget: W, index?: number): void {
    const at =
      index === undefined ? this.widgets.length : Math.max(0, Math.min(this.widgets.length, Math.trunc(index)));
    this.widgets.splice(at, 0, widget);
    if (this.focusIndex === null) {
      this.focusIndex = at;
    } else if (at <= this.focusIndex) {
      this.focusIndex++;
    }
  }

  removeWidget(widget: W): void {
    const index = this.widgets.indexOf(widget);
    if (index < 0) return;
    this.widgets.splice(index, 1);
    if (this.focusIndex === null) return;
    if (this.widgets.length === 0) {
      this.focusIndex = null;
    } else if (index < this.focusIndex) {
      this.focusIndex--;
    } else if (index === this.focusIndex) {
      this.focusIndex = Math.min(index, this.widgets.length - 1);
    }
  }

  clearWidgets(): void {
    this.widgets.length = 0;
    this.focusIndex = null;
  }

  get focusPosition(): number | null {
    return this.focusIndex;
  }

  set focusPosition(position: number | null) {
    if (position === null) {
      this.focusIndex = null;
      return;
    }
    if (!Number.isInteger(position) || position < 0 || position >= this.widgets.length) {
      throw new SkeinError(
        "SKEIN_NOT_FOUND",
        `focusPosition: index ${String(position)} is out of range (length ${String(this.widgets.length)})`,
      );
    }
    this.focusIndex = position;
  }

  get focusedWidget(): W | undefined {
    return this.focusIndex === null ? undefined : this.widgets[this.focusIndex];
  }

  /** Moves focus by `delta`, clamped to the list. Returns whether focus changed. */
  moveFocus(delta: number): boolean {
    if (this.widgets.length === 0) return false;
    const from = this.focusIndex ?? 0;
    const to = Math.max(0, Math.min(this.widgets.length - 1, from + Math.trunc(delta)));
    if (to === this.focusIndex) return false;
    this.focusIndex = to;
    return true;
  }
}
