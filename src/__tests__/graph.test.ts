import { advance, advanceWithCapture, routeAfterExtraction } from '../graph/graph';
import { createSession } from '../graph/state';
import { completionNode } from '../graph/nodes/completion';
import { llmService } from '../services/llm.service';
import { validationService } from '../services/validation.service';
import { guidanceService } from '../services/guidance.service';
import { MESSAGES } from '../prompts/templates';
import { FieldName, FieldValues } from '../types';
import { FORM_COMPLETE, SessionState } from '../types/graph';
import { config } from '../core/config';

const SESSION_ID = '507f1f77bcf86cd799439011';

function llmReply(payload: Record<string, unknown>) {
  return { content: JSON.stringify(payload), model: 'test-model' };
}

function provides(value: unknown, confidence: number = 0.95) {
  return llmReply({ intent: 'provide_value', extracted_value: value, confidence, reasoning: 'test' });
}

function intent(name: string, confidence: number = 0.9) {
  return llmReply({ intent: name, extracted_value: null, confidence, reasoning: 'test' });
}

const FILLED: FieldValues = {
  full_name: 'Jane Doe',
  email: 'jane@example.com',
  age: 34,
  occupation: 'Data Engineer',
  experience_level: 'Advanced',
  preferred_language: 'Python',
  project_interests: ['Web Development', 'Machine Learning'],
  availability_per_week: 20,
  start_date: '2025-06-01',
};

const REQUIRED: FieldName[] = [
  'full_name',
  'email',
  'age',
  'occupation',
  'experience_level',
  'preferred_language',
  'project_interests',
  'availability_per_week',
  'start_date',
];

function sessionAt(field: FieldName, completedFields: FieldName[], fieldValues: FieldValues): SessionState {
  return { ...createSession(SESSION_ID), currentField: field, completedFields, fieldValues };
}

describe('form graph', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should greet with the first question', () => {
    const session = createSession(SESSION_ID);

    expect(session.currentField).toBe('full_name');
    expect(session.messages).toEqual([
      {
        speaker: 'assistant',
        text: "Hello! I'm your voice assistant, here to help you complete this form. Let's start with your full name. What is your full name?",
      },
    ]);
  });

  test('should propose an extracted value and save it on confirmation', async () => {
    const chat = jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides('Jane Doe'));

    const proposed = await advance(createSession(SESSION_ID), 'My name is Jane Doe');

    expect(proposed.reply).toBe("I've captured that your full name is: Jane Doe. Is that correct?");
    expect(proposed.session.confirmationPending).toBe(true);
    expect(proposed.session.pendingValue).toBe('Jane Doe');
    expect(proposed.session.currentField).toBe('full_name');

    const confirmed = await advance(proposed.session, 'yes');

    expect(confirmed.reply).toBe("Great! I've saved your full name: Jane Doe\n\nWhat is your email address?");
    expect(confirmed.session.fieldValues).toEqual({ full_name: 'Jane Doe' });
    expect(confirmed.session.completedFields).toEqual(['full_name']);
    expect(confirmed.session.currentField).toBe('email');
    expect(confirmed.session.confirmationPending).toBe(false);
    expect(confirmed.session.pendingValue).toBeNull();
    expect(chat).toHaveBeenCalledTimes(1);
  });

  test('should leave the current utterance out of the extraction history', async () => {
    const chat = jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides('Jane Doe'));

    await advance(createSession(SESSION_ID), 'Jane Doe');

    const messages = chat.mock.calls[0][0];
    expect(messages.map(m => m.role)).toEqual(['system', 'assistant', 'user']);
    expect(messages[2].content).toBe('Jane Doe');
  });

  test('should discard the pending value when the user denies it', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides('Jane Dough'));

    const proposed = await advance(createSession(SESSION_ID), 'Jane Dough');
    const denied = await advance(proposed.session, "no, that's wrong");

    expect(denied.reply).toBe("I apologize for the misunderstanding. Let's try again. What is your full name?");
    expect(denied.session.confirmationPending).toBe(false);
    expect(denied.session.pendingValue).toBeNull();
    expect(denied.session.currentField).toBe('full_name');
    expect(denied.session.fieldValues).toEqual({});
  });

  test('should reset the attempt counter when a proposed value is denied', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides(15)).mockResolvedValueOnce(provides(30));
    let session = sessionAt('age', ['full_name', 'email'], { full_name: 'Jane Doe', email: 'jane@example.com' });

    session = (await advance(session, '15')).session;
    expect(session.extractionAttempts).toBe(1);

    session = (await advance(session, '30')).session;
    expect(session.confirmationPending).toBe(true);
    expect(session.extractionAttempts).toBe(1);

    const denied = await advance(session, 'no');

    expect(denied.session.extractionAttempts).toBe(0);
    expect(denied.session.confirmationPending).toBe(false);
    expect(denied.session.pendingValue).toBeNull();
    expect(denied.session.fieldValues.age).toBeUndefined();
  });

  test('should ask again when a confirmed value no longer passes validation', async () => {
    const chat = jest.spyOn(llmService, 'chat');
    const session: SessionState = {
      ...sessionAt('age', ['full_name', 'email'], { full_name: 'Jane Doe', email: 'jane@example.com' }),
      pendingValue: 15,
      confirmationPending: true,
    };

    const result = await advance(session, 'yes');

    expect(result.reply).toBe("I apologize for the misunderstanding. Let's try again. What is your age?");
    expect(result.session.currentField).toBe('age');
    expect(result.session.completedFields).toEqual(['full_name', 'email']);
    expect(result.session.fieldValues.age).toBeUndefined();
    expect(result.session.confirmationPending).toBe(false);
    expect(result.session.pendingValue).toBeNull();
    expect(chat).not.toHaveBeenCalled();
  });

  describe('confirmation classified by the backend', () => {
    let restoreLexical: () => void;

    beforeEach(() => {
      const replaced = jest.replaceProperty(config.extraction, 'lexicalConfirmation', false);
      restoreLexical = () => replaced.restore();
    });

    afterEach(() => {
      restoreLexical();
    });

    function pendingName(): SessionState {
      return { ...createSession(SESSION_ID), pendingValue: 'Jane Doe', confirmationPending: true };
    }

    test('should treat any other intent as a denial', async () => {
      jest.spyOn(llmService, 'chat').mockResolvedValueOnce(intent('request_help'));

      const result = await advance(pendingName(), 'what do you mean?');

      expect(result.reply).toBe("I apologize for the misunderstanding. Let's try again. What is your full name?");
      expect(result.session.confirmationPending).toBe(false);
      expect(result.session.pendingValue).toBeNull();
      expect(result.session.fieldValues).toEqual({});
      expect(result.session.currentField).toBe('full_name');
    });

    test('should not save on a low-confidence confirmation', async () => {
      jest.spyOn(llmService, 'chat').mockResolvedValueOnce(intent('confirm', 0.05));

      const result = await advance(pendingName(), 'mm');

      expect(result.reply).toBe("I apologize for the misunderstanding. Let's try again. What is your full name?");
      expect(result.session.fieldValues).toEqual({});
      expect(result.session.confirmationPending).toBe(false);
    });

    test('should save on a confident confirmation', async () => {
      jest.spyOn(llmService, 'chat').mockResolvedValueOnce(intent('confirm', 0.9));

      const result = await advance(pendingName(), 'that is right');

      expect(result.session.fieldValues).toEqual({ full_name: 'Jane Doe' });
      expect(result.session.currentField).toBe('email');
    });
  });

  test('should guide the user after an invalid age', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides(15));
    const session = sessionAt('age', ['full_name', 'email'], { full_name: 'Jane Doe', email: 'jane@example.com' });

    const result = await advance(session, "I'm 15");

    expect(result.reply).toBe(
      "I'm having trouble with your age. It must be at least 18. Your age should be a number between 18 and 120. Could you please try again?"
    );
    expect(result.session.extractionAttempts).toBe(1);
    expect(result.session.currentField).toBe('age');
    expect(result.session.confirmationPending).toBe(false);
  });

  test('should escalate guidance with examples on the third failure', async () => {
    jest
      .spyOn(llmService, 'chat')
      .mockResolvedValueOnce(provides(15))
      .mockResolvedValueOnce(provides(12))
      .mockResolvedValueOnce(provides(10));
    let session = sessionAt('age', ['full_name', 'email'], { full_name: 'Jane Doe', email: 'jane@example.com' });

    session = (await advance(session, '15')).session;
    session = (await advance(session, '12')).session;
    const third = await advance(session, '10');

    expect(third.session.extractionAttempts).toBe(3);
    expect(third.reply).toBe(
      "I'm having trouble with your age. It must be at least 18. Your age should be a number between 18 and 120. " +
        'Here are some examples of valid answers: "30", "45", "62". Could you please try again?'
    );
  });

  test('should refuse to skip a required field', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(intent('request_skip'));
    const session = sessionAt('email', ['full_name'], { full_name: 'Jane Doe' });

    const result = await advance(session, 'skip this one');

    expect(result.reply).toBe(
      "I'm sorry, but email address is a required field and cannot be skipped. Could you please provide this information?"
    );
    expect(result.session.currentField).toBe('email');
    expect(result.session.complete).toBe(false);
  });

  test('should complete the form when the optional last field is skipped', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(intent('request_skip'));
    const session = sessionAt('additional_notes', REQUIRED, FILLED);

    const result = await advance(session, 'skip');

    expect(result.session.complete).toBe(true);
    expect(result.session.currentField).toBe(FORM_COMPLETE);
    expect(result.session.fieldValues.additional_notes).toBeNull();
    expect(result.session.finalOutput).toEqual(FILLED);
    expect(result.reply).toBe(
      `No problem, we can skip the additional notes field.\n\n${MESSAGES.COMPLETION(guidanceService.composeSummary(FILLED))}`
    );
  });

  test('should answer a help request with field help', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(intent('request_help'));
    const session = sessionAt('age', ['full_name', 'email'], { full_name: 'Jane Doe', email: 'jane@example.com' });

    const result = await advance(session, 'what do you need?');

    expect(result.reply).toBe('Please provide your age as a number between 18 and 120.');
    expect(result.session.extractionAttempts).toBe(0);
  });

  test('should ask again without counting an attempt on low confidence', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides('Jane', 0.1));

    const result = await advance(createSession(SESSION_ID), 'mumble');

    expect(result.reply).toBe("I'm sorry, I didn't understand that. Could you please repeat?");
    expect(result.session.extractionAttempts).toBe(0);
    expect(result.session.confirmationPending).toBe(false);
  });

  test('should ask again when the backend is unavailable', async () => {
    jest.spyOn(llmService, 'chat').mockRejectedValueOnce(new Error('network down'));

    const result = await advance(createSession(SESSION_ID), 'Jane Doe');

    expect(result.accepted).toBe(true);
    expect(result.reply).toBe("I'm sorry, I didn't understand that. Could you please repeat?");
  });

  test('should ignore empty input', async () => {
    const session = createSession(SESSION_ID);

    const result = await advance(session, '   ');

    expect(result).toEqual({ session, accepted: false, reply: null });
  });

  test('should keep the prior state when a turn fails', async () => {
    jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides('Jane Doe'));
    jest.spyOn(validationService, 'validate').mockImplementation(() => {
      throw new Error('validator exploded');
    });
    const session = createSession(SESSION_ID);

    const result = await advance(session, 'Jane Doe');

    expect(result.reply).toBe("I'm having trouble processing your input. Could you please try again?");
    expect(result.error).toContain('validator exploded');
    expect(result.session.currentField).toBe('full_name');
    expect(result.session.messages.slice(1)).toEqual([
      { speaker: 'user', text: 'Jane Doe' },
      { speaker: 'assistant', text: "I'm having trouble processing your input. Could you please try again?" },
    ]);
  });

  test('should walk every field to a completed form', async () => {
    const answers: Array<[string, unknown]> = [
      ['Jane Doe', 'Jane Doe'],
      ['jane@example.com', 'jane@example.com'],
      ['thirty four', '34'],
      ['I am a data engineer', 'Data Engineer'],
      ['advanced', 'advanced'],
      ['Python', 'Python'],
      ['web development and machine learning', 'Web Development, Machine Learning'],
      ['twenty hours', 20],
      ['June first 2025', '2025-06-01'],
      ['I prefer remote work', 'I prefer remote work'],
    ];
    const chat = jest.spyOn(llmService, 'chat');
    let session = createSession(SESSION_ID);

    for (const [utterance, extracted] of answers) {
      chat.mockResolvedValueOnce(provides(extracted));
      session = (await advance(session, utterance)).session;
      expect(session.confirmationPending).toBe(true);
      session = (await advance(session, 'yes')).session;
    }

    const expected: FieldValues = { ...FILLED, additional_notes: 'I prefer remote work' };
    expect(session.complete).toBe(true);
    expect(session.completedFields).toHaveLength(10);
    expect(session.finalOutput).toEqual(expected);
    expect(session.messages[session.messages.length - 1].text).toBe(
      MESSAGES.COMPLETION(guidanceService.composeSummary(expected))
    );
    expect(chat).toHaveBeenCalledTimes(10);
  });

  test('should not reopen a completed form', async () => {
    const session: SessionState = { ...sessionAt('age', REQUIRED, FILLED), currentField: FORM_COMPLETE, complete: true };
    const chat = jest.spyOn(llmService, 'chat');

    const result = await advance(session, 'hello again');

    expect(result.reply).toBe(MESSAGES.ALREADY_COMPLETE);
    expect(result.session.messages).toHaveLength(session.messages.length + 2);
    expect(chat).not.toHaveBeenCalled();
  });

  describe('capture', () => {
    test('should report a failed capture without touching the session', async () => {
      const session = createSession(SESSION_ID);

      await expect(advanceWithCapture(session, { success: false, error: 'Microphone unavailable' })).resolves.toEqual({
        session,
        accepted: false,
        reply: null,
        error: 'Microphone unavailable',
      });
      expect((await advanceWithCapture(session, { success: true, text: '  ' })).error).toBe('No speech was detected');
    });

    test('should process captured text as a turn', async () => {
      jest.spyOn(llmService, 'chat').mockResolvedValueOnce(provides('Jane Doe'));

      const result = await advanceWithCapture(createSession(SESSION_ID), { success: true, text: 'Jane Doe' });

      expect(result.accepted).toBe(true);
      expect(result.session.pendingValue).toBe('Jane Doe');
    });
  });

  describe('routeAfterExtraction', () => {
    test('should send every reply to a pending value to confirmation', () => {
      expect(
        routeAfterExtraction({
          confirmationPending: true,
          extraction: { intent: 'other', confidence: 0, reasoning: '' },
        })
      ).toBe('confirm');
    });

    test('should route by intent', () => {
      const route = (name: 'request_help' | 'request_skip' | 'deny') =>
        routeAfterExtraction({ confirmationPending: false, extraction: { intent: name, confidence: 0.9, reasoning: '' } });

      expect(route('request_help')).toBe('help');
      expect(route('request_skip')).toBe('skip');
      expect(route('deny')).toBe('reprompt');
      expect(
        routeAfterExtraction({
          confirmationPending: false,
          extraction: { intent: 'provide_value', value: 'x', confidence: 0.9, reasoning: '' },
        })
      ).toBe('validate');
    });
  });

  describe('completionNode', () => {
    type CompletionInput = Parameters<typeof completionNode>[0];

    function input(overrides: Partial<CompletionInput>): CompletionInput {
      return {
        sessionId: SESSION_ID,
        currentField: FORM_COMPLETE,
        completedFields: [...REQUIRED],
        fieldValues: FILLED,
        messages: [],
        summaryAnnounced: false,
        ...overrides,
      };
    }

    test('should not announce the summary twice', () => {
      expect(completionNode(input({ summaryAnnounced: true }))).toEqual({ complete: true });
    });

    test('should return to a required field that is still open', () => {
      const update = completionNode(input({ completedFields: REQUIRED.filter(name => name !== 'email') }));

      expect(update.currentField).toBe('email');
      expect(update.messages).toEqual([{ speaker: 'assistant', text: 'What is your email address?' }]);
    });

    test('should announce the summary once every required field is done', () => {
      const update = completionNode(input({}));

      expect(update.complete).toBe(true);
      expect(update.summaryAnnounced).toBe(true);
      expect(update.finalOutput).toEqual(FILLED);
    });

    test('should send the pointer back to a stored value that fails the final check', () => {
      const update = completionNode(input({ fieldValues: { ...FILLED, age: 15 } }));

      expect(update.complete).toBeUndefined();
      expect(update.currentField).toBe('age');
      expect(update.completedFields).toEqual(REQUIRED.filter(name => name !== 'age'));
      expect(update.fieldValues).not.toHaveProperty('age');
      expect(update.fieldValues?.full_name).toBe('Jane Doe');
      expect(update.messages).toEqual([{ speaker: 'assistant', text: 'How old are you?' }]);
    });

    test('should do nothing while fields remain', () => {
      expect(completionNode(input({ currentField: 'age' }))).toEqual({});
    });
  });
});
