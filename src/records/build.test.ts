import { sampleRun } from '../testing/fakes';
import { toFeedbackRecord, toRunRecord } from './build';

describe('toRunRecord', () => {
  it('flattens a completed run', () => {
    expect(toRunRecord(sampleRun())).toEqual({
      id: 'run-1',
      kind: 'run',
      version: 1,
      created_at: '2024-05-01T10:00:00.000Z',
      session_id: 'session-1',
      input_json: '{"comment":"Vegans lack protein","draft_reply":""}',
      input_type: 'comment',
      needs_clarification: false,
      follow_up_question: null,
      message: 'Beans, lentils, tofu.',
      explanation: 'Concrete foods.',
      raw_tags: ['Skeptical'],
      justified_tags: ['skeptical'],
      matched_tags: ['skeptical'],
      matched_strategies: ['Health Evidence', 'Acknowledge First'],
      rating: null,
      feedback: null,
      rebuttal: 'Not enough.',
      confidence_score: 6.5,
      justification: 'Fine.',
      suggested_improvements: 'Add a source.',
      ultimate_reply: 'Beans, lentils and tofu, per dietitians.',
    });
  });

  it('flattens a clarification run', () => {
    const record = toRunRecord(
      sampleRun({
        result: { kind: 'clarification', follow_up_question: 'Whose text is this?' },
        rebuttal: null,
        evaluation: null,
      }),
    );
    expect(record).toMatchObject({
      needs_clarification: true,
      follow_up_question: 'Whose text is this?',
      input_type: null,
      message: null,
      explanation: null,
      rebuttal: null,
      confidence_score: null,
      ultimate_reply: null,
    });
  });

  it('does not carry the prior feedback into rating columns', () => {
    const record = toRunRecord(sampleRun({ prior_feedback: { rating: 2, text: 'meh' } }));
    expect(record.rating).toBeNull();
    expect(record.feedback).toBeNull();
  });
});

describe('toFeedbackRecord', () => {
  it('creates a new feedback record for the same run', () => {
    const record = toFeedbackRecord(sampleRun(), { rating: 4, text: 'Good' }, new Date('2024-05-01T11:00:00.000Z'));
    expect(record.id).not.toBe('run-1');
    expect(record).toMatchObject({
      kind: 'feedback',
      version: 1,
      session_id: 'session-1',
      created_at: '2024-05-01T11:00:00.000Z',
      rating: 4,
      feedback: 'Good',
      message: 'Beans, lentils, tofu.',
    });
  });

  it('stores absent parts of the feedback as null', () => {
    const record = toFeedbackRecord(sampleRun(), { text: 'Shorter' });
    expect(record.rating).toBeNull();
    expect(record.feedback).toBe('Shorter');
  });
});
