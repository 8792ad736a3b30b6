import { describe, expect, it } from 'vitest';
import { ChapterProgress, chapterCaption, formatProgress } from '../../src/reader/progress.ts';
import { FakeLabel, FakeScreen, FakeTextView, numberedLines } from '../helpers.ts';

describe('chapterCaption', () => {
  it('quotes the name and shows the position in the book', () => {
    expect(chapterCaption('Chapter 1', 0, 4)).toBe('"Chapter 1" (0.00%)');
    expect(chapterCaption('Intro', 1, 3)).toBe('"Intro" (33.33%)');
  });
});

describe('formatProgress', () => {
  it('shows the visible line range', () => {
    expect(formatProgress('cap', 0, 20, 200)).toBe('cap - lines 1-20/200');
  });

  it('stops the range at the last line', () => {
    expect(formatProgress('cap', 190, 20, 200)).toBe('cap - lines 191-200/200');
  });

  it('handles empty text', () => {
    expect(formatProgress('cap', 0, 20, 0)).toBe('cap - lines 0-0/0');
  });
});

describe('ChapterProgress', () => {
  function setup(): { text: FakeTextView; label: FakeLabel; progress: ChapterProgress } {
    const text = new FakeTextView(20);
    text.setText(numberedLines(200));
    const label = new FakeLabel();
    return { text, label, progress: new ChapterProgress(text, label, 'cap') };
  }

  it('starts with the bare caption', () => {
    const { label } = setup();

    expect(label.text).toBe('cap');
  });

  it('refreshes only when the offset changed', () => {
    const { text, label, progress } = setup();

    expect(progress.refresh()).toBe(true);
    expect(label.text).toBe('cap - lines 1-20/200');
    expect(progress.refresh()).toBe(false);

    text.scrollTo(50);
    expect(progress.refresh()).toBe(true);
    expect(label.text).toBe('cap - lines 51-70/200');
  });

  it('refreshes again after being invalidated', () => {
    const { progress } = setup();

    progress.refresh();
    progress.invalidate();

    expect(progress.refresh()).toBe(true);
  });

  it('queues a refresh on every repaint and redraws once per offset', () => {
    const { text, progress } = setup();
    const screen = new FakeScreen();
    progress.attach(screen);

    text.repaint();
    text.repaint();
    text.scrollTo(10);
    text.repaint();

    expect(screen.updates).toBe(3);
    expect(screen.renders).toBe(2);
  });
});
