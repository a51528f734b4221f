/**
 * AnkiConnect action dispatch
 *
 * Validates a request body, builds a Renshuu service for the caller's key
 * and runs the action. `multi` runs its entries in order; a failing entry
 * yields an error envelope at its position and the rest still run.
 */

import type { Logger } from 'winston';
import {
  ANKI_CONSTANTS,
  ActionResult,
  AnkiResponse,
  SingleRequest,
  errorEnvelope,
} from '../../../shared/src';
import { toConnectError } from '../errors';
import { RenshuuService } from '../services/RenshuuService';
import { logger as rootLogger } from '../utils/logger';
import { OPERATIONS, createLogContext } from '../utils/logger-standards';
import { parseAnkiRequest, parseMultiEntry } from './schemas';

export type ServiceFactory = (apiKey: string) => RenshuuService;

export class ActionDispatcher {
  private readonly createService: ServiceFactory;

  constructor(createService: ServiceFactory) {
    this.createService = createService;
  }

  /**
   * Handle one request body
   *
   * @throws {ConnectError} When the request itself is invalid or a single
   * action fails
   */
  async handle(body: unknown, logger: Logger = rootLogger): Promise<AnkiResponse> {
    const request = parseAnkiRequest(body);
    const service = this.createService(request.key);

    if (request.action !== 'multi') {
      logger.debug('Dispatching action', createLogContext(OPERATIONS.ACTION_DISPATCH, { action: request.action }));
      return this.dispatch(request, service);
    }

    const results: ActionResult[] = [];
    for (const entry of request.params.actions) {
      try {
        const single = parseMultiEntry(entry, request.key);
        logger.debug('Dispatching action', createLogContext(OPERATIONS.ACTION_DISPATCH, {
          action: single.action,
          multi: true,
        }));
        results.push(await this.dispatch(single, service));
      } catch (error) {
        const connectError = toConnectError(error);
        logger.warn('Action in multi failed', createLogContext(OPERATIONS.ACTION_FAILED, {
          action: entry.action,
          ...connectError.toLogData(),
        }));
        results.push(errorEnvelope(connectError.toUserMessage()));
      }
    }
    return results;
  }

  async dispatch(request: SingleRequest, service: RenshuuService): Promise<ActionResult> {
    switch (request.action) {
      case 'version':
        return ANKI_CONSTANTS.PROTOCOL_VERSION;
      case 'deckNames':
        return service.getSchedules();
      case 'modelNames':
        return [...ANKI_CONSTANTS.MODEL_NAMES];
      case 'modelFieldNames':
        return [...ANKI_CONSTANTS.MODEL_FIELD_NAMES];
      case 'storeMediaFile':
        return '';
      case 'addNote':
        return service.addNote(request.params.note);
      case 'canAddNotes':
        return Promise.all(request.params.notes.map(async (note) => service.canAddNote(note)));
      case 'canAddNotesWithErrorDetail':
        return Promise.all(
          request.params.notes.map(async (note) => service.canAddNoteWithErrorDetail(note))
        );
      case 'findNotes':
        return service.findNotes(request.params.query);
      default: {
        const unreachable: never = request;
        throw new Error(`Unhandled action: ${JSON.stringify(unreachable)}`);
      }
    }
  }
}
