import { EVALUATION_JSON, ScriptedLLM, makeDeps } from '../testing/fakes';
import { EVALUATION_FAILED, evaluateReply, parseConfidence, parseEvaluationResponse } from './evaluator';

describe('parseConfidence', () => {
  it.each([
    [7, 7],
    ['7.5', 7.5],
    [0, 0],
    [10, 10],
    [11, null],
    [-1, null],
    ['high', null],
    ['', null],
    [null, null],
  ])('%p -> %p', (input, expected) => {
    expect(parseConfidence(input)).toBe(expected);
  });
});

describe('parseEvaluationResponse', () => {
  it('decodes all fields', () => {
    expect(parseEvaluationResponse(EVALUATION_JSON)).toEqual({
      confidence_score: 7,
      justification: 'Clear and friendly.',
      suggested_improvements: 'Name a source.',
      ultimate_reply: 'Beans and lentils are complete enough when combined.',
      raw_output: EVALUATION_JSON,
    });
  });

  it('defaults missing fields', () => {
    expect(parseEvaluationResponse('{"confidence_score": "n/a"}')).toEqual({
      confidence_score: null,
      justification: '',
      suggested_improvements: '',
      ultimate_reply: '',
      raw_output: '{"confidence_score": "n/a"}',
    });
  });

  it('marks non-JSON answers as failed', () => {
    expect(parseEvaluationResponse('Looks good to me')).toEqual({
      confidence_score: null,
      justification: EVALUATION_FAILED,
      suggested_improvements: '',
      ultimate_reply: '',
      raw_output: 'Looks good to me',
    });
  });
});

describe('evaluateReply', () => {
  it('renders the prompt with the rebuttal placeholder when there is none', async () => {
    const llm = new ScriptedLLM([EVALUATION_JSON]);
    const res = await evaluateReply(makeDeps(llm), 'reply text', '', 'the comment', '- **S**: d');
    expect(res.confidence_score).toBe(7);
    expect(llm.systemPrompt(0)).toBe('EVAL the comment | reply text | (none) | - **S**: d');
    expect(llm.calls[0].options).toEqual({ temperature: 0.3, max_tokens: 600 });
  });

  it('keeps the call error as raw output', async () => {
    const llm = new ScriptedLLM([new Error('rate limited')]);
    await expect(evaluateReply(makeDeps(llm), 'r', 'b', 'c', 's')).resolves.toEqual({
      confidence_score: null,
      justification: EVALUATION_FAILED,
      suggested_improvements: '',
      ultimate_reply: '',
      raw_output: 'rate limited',
    });
  });
});
