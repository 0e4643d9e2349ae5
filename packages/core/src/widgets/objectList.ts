/**
 * A focusable list of widgets kept in sync with a set of business objects.
 */

import { FocusList } from "./focusList.js";
import { ObjectContainer } from "./objectContainer.js";
import type { KeyFunction } from "./sortKey.js";

export type ObjectListOptions<T, W> = Readonly<{
  createWidget: (item: T) => W;
  keyFunction?: KeyFunction<T>;
  prepareWidget?: (widget: W, item: T) => void;
  refreshWidget?: (widget: W) => void;
}>;

export type ObjectList<T, W> = Readonly<{
  list: FocusList<W>;
  items: ObjectContainer<T, W>;
}>;

export function createObjectList<T, W>(opts: ObjectListOptions<T, W>): ObjectList<T, W> {
  const list = new FocusList<W>();
  const items = new ObjectContainer<T, W>({ ...opts, container: list });
  return Object.freeze({ list, items });
}
