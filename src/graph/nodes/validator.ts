import { validationService } from '../../services/validation.service';
import { logger } from '../../core/logger';
import { FormGraphState } from '../state';
import { activeField } from '../transitions';

export function validatorNode(state: FormGraphState): Partial<FormGraphState> {
  const field = activeField(state);
  const candidate = state.extraction?.intent === 'provide_value' ? state.extraction.value : null;

  const validation = validationService.validate(field, candidate);

  logger.debug('Validator node executed', {
    field: field.name,
    valid: validation.valid,
    code: validation.error?.code,
  });

  return { validation };
}
