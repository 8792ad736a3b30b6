import { errorMessage } from '../../errors.ts';
import type { ReaderEvent } from '../types.ts';

export class ConsoleListener {
  listen(event: ReaderEvent): void {
    switch (event.type) {
      case 'book:open:start':
        console.log(`📖 Opening ebook: ${event.inputFile}`);
        break;

      case 'book:open:complete':
        console.log(`Title: ${event.title}`);
        console.log(`Chapters: ${event.totalChapters}`);
        break;

      case 'session:load':
        if (event.found) {
          console.log(`Resuming session from ${event.sessionFile}`);
        }
        break;

      case 'session:save':
        console.log(`✓ Session saved to ${event.sessionFile}`);
        break;

      case 'session:save:failed':
        console.error(`Failed to save session to ${event.sessionFile}: ${errorMessage(event.error)}`);
        break;
    }
  }
}
