import { Injectable, Logger } from '@nestjs/common';
import { RequestState } from '../rag/state/request-state';
import { RequestEvent, RequestEventType } from '../rag/state/request-event-log';
import { errorMessage } from '../../common/utils/errors';

/**
 * Publishes progress events onto a request's event log for the streaming
 * transport. Calling it never changes the caller's outcome.
 */
@Injectable()
export class EventEmitterService {
  private readonly logger = new Logger(EventEmitterService.name);

  emit(
    state: RequestState,
    type: RequestEventType,
    payload: Record<string, unknown> = {},
  ): RequestEvent | null {
    if (!state.stream) return null;

    try {
      const event = state.events.append(type, payload);
      if (event) {
        this.logger.debug(
          `📡 [${state.requestId.slice(0, 8)}] #${event.seq} ${type} @${event.timestamp}ms`,
        );
      }
      return event;
    } catch (error) {
      this.logger.warn(`⚠️ Failed to emit ${type}: ${errorMessage(error)}`);
      return null;
    }
  }
}
