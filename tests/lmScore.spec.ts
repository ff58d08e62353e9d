import { createLmScore, splitArgs } from '../src/services/lmScore';
import { EndpointError, PreconditionError } from '../src/lib/errors';
import { ScriptedClient, testConfig } from './fakes';

describe('LM_SCORE', () => {
  it('scores a single content value', async () => {
    const lmScore = createLmScore(testConfig(), new ScriptedClient(['Score: 10']));
    const out = await lmScore('This is a test', 'Is this a test?');
    expect(out.score).toBe(10);
  });

  it('returns the number the model gives', async () => {
    const lmScore = createLmScore(testConfig(), new ScriptedClient(['3']));
    const out = await lmScore('We have a meeting today at 3:00', 'Are we meeting today at 4:00?');
    expect(out.score).toBe(3);
  });

  it('puts every content value in the prompt, in order', async () => {
    const client = new ScriptedClient(['9']);
    const lmScore = createLmScore(testConfig(), client);
    await lmScore('Weekly invoice 12/12/2022', '$14,000', 'Is my invoice greater than $5,000?');
    expect(client.prompts[0]).toContain('Content:\nWeekly invoice 12/12/2022\n$14,000\n\n');
    expect(client.prompts[0]).toContain('answer this yes/no question: Is my invoice greater than $5,000?\n');
  });

  it('aggregates an ensemble of sequential calls', async () => {
    const client = new ScriptedClient(['8', '8', '3']);
    const lmScore = createLmScore(testConfig({ ensemble: true, ensembleSize: 3, aggregation: 'majority' }), client);
    const out = await lmScore('Release notes for v2', 'Is this about a software release?');
    expect(out.score).toBe(8);
    expect(client.prompts).toHaveLength(3);
    expect(new Set(client.prompts).size).toBe(1);
  });

  it('rejects a single argument before any call', async () => {
    const client = new ScriptedClient(['8']);
    const lmScore = createLmScore(testConfig(), client);
    await expect(lmScore('only one argument')).rejects.toBeInstanceOf(PreconditionError);
    await expect(lmScore()).rejects.toBeInstanceOf(PreconditionError);
    expect(client.prompts).toHaveLength(0);
  });

  it('surfaces endpoint failures as errors, not as a neutral score', async () => {
    const lmScore = createLmScore(testConfig(), new ScriptedClient([new EndpointError('connection refused')]));
    await expect(lmScore('content', 'question?')).rejects.toMatchObject({ code: 'endpoint_error' });
  });
});

describe('splitArgs', () => {
  it('takes the last argument as the question', () => {
    expect(splitArgs(['a', 'b', 'q?'])).toEqual({ contentParts: ['a', 'b'], question: 'q?' });
  });

  it('drops null content and stringifies numbers and booleans', () => {
    expect(splitArgs([null, 'Invoice', 14000, true, undefined, 'q?'])).toEqual({
      contentParts: ['Invoice', '14000', 'true'],
      question: 'q?'
    });
  });

  it('rejects content that is entirely null', () => {
    expect(() => splitArgs([null, null, 'q?'])).toThrow('LM_SCORE content is empty');
  });

  it('rejects a question that is not text', () => {
    expect(() => splitArgs(['content', 5])).toThrow(PreconditionError);
    expect(() => splitArgs(['content', null])).toThrow(PreconditionError);
  });
});
