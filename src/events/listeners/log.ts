import type { Logger } from '../../logger/mod.ts';
import type { ReaderEvent } from '../types.ts';

export class LogListener {
  constructor(private readonly logger: Logger) {}

  listen(event: ReaderEvent): void {
    switch (event.type) {
      case 'session:save:failed':
        this.logger.error(`Failed to save session to ${event.sessionFile}`, event.error);
        break;

      case 'page:change':
      case 'mark:set':
      case 'width:change':
        this.logger.debug(event.type, this.meta(event));
        break;

      default:
        this.logger.info(event.type, this.meta(event));
    }
  }

  private meta(event: ReaderEvent): Record<string, unknown> {
    const { type: _type, ...rest } = event;
    return rest;
  }
}
