import type { ListView, ScreenUpdate } from './types.ts';

/** The slice of a toolkit list widget the contents view drives. */
export interface SelectableList {
  on(event: 'select item' | 'select', listener: (item: unknown, index: number) => void): unknown;
  addItem(label: string): unknown;
  select(index: number): unknown;
}

export class TerminalListView implements ListView {
  private readonly handlers: Array<() => void> = [];
  private selected = 0;

  constructor(private readonly list: SelectableList, schedule: (update: ScreenUpdate) => void) {
    // Mouse clicks move the selection inside the widget, keep track of it
    this.list.on('select item', (_item, index) => {
      this.selected = index;
    });
    this.list.on('select', (_item, index) => {
      schedule(() => {
        const handler = this.handlers[index];
        handler?.();
        return handler !== undefined;
      });
    });
  }

  addItem(label: string, onSelect: () => void): void {
    this.list.addItem(label);
    this.handlers.push(onSelect);
  }

  setCurrentIndex(index: number): void {
    this.selected = Math.max(0, Math.min(index, this.handlers.length - 1));
    this.list.select(this.selected);
  }

  getCurrentIndex(): number {
    return this.selected;
  }

  getItemCount(): number {
    return this.handlers.length;
  }
}
