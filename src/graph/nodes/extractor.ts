import { extractionService } from '../../services/extraction.service';
import { logger } from '../../core/logger';
import { config } from '../../core/config';
import { FormGraphState } from '../state';
import { activeField } from '../transitions';

export async function extractorNode(state: FormGraphState): Promise<Partial<FormGraphState>> {
  const field = activeField(state);

  // the last entry is the utterance being processed
  const history = state.messages.slice(0, -1).slice(-config.extraction.historyWindow);

  const extraction = await extractionService.extract(state.userText, field, history, {
    confirmationPending: state.confirmationPending,
    pendingValue: state.pendingValue,
  });

  logger.info('Extractor node executed', {
    sessionId: state.sessionId,
    field: field.name,
    intent: extraction.intent,
    confidence: extraction.confidence,
    confirmationPending: state.confirmationPending,
  });

  return { extraction };
}
