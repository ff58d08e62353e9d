import { scoreContent, scoreContentDetailed } from '../src/services/scoring';
import { buildPrompt } from '../src/services/prompt';
import { EndpointError, PreconditionError } from '../src/lib/errors';
import { ScriptedClient, testConfig } from './fakes';

describe('scoreContentDetailed', () => {
  it('makes a single call when ensembling is off', async () => {
    const client = new ScriptedClient(['Score: 10']);
    const out = await scoreContentDetailed(['This is a test'], 'Is this a test?', testConfig({ ensembleSize: 5 }), client);
    expect(out).toEqual({ score: 10, samples: [10], fallbacks: 0 });
    expect(client.prompts).toEqual([buildPrompt(['This is a test'], 'Is this a test?')]);
  });

  it('issues ensembleSize calls with the identical prompt and takes the majority', async () => {
    const client = new ScriptedClient(['8', '8', '3']);
    const config = testConfig({ ensemble: true, ensembleSize: 3, aggregation: 'majority' });
    const out = await scoreContentDetailed(['Quarterly report attached'], 'Is this a report?', config, client);
    expect(out.score).toBe(8);
    expect(out.samples).toEqual([8, 8, 3]);
    expect(client.prompts).toHaveLength(3);
    const expected = buildPrompt(['Quarterly report attached'], 'Is this a report?');
    for (const prompt of client.prompts) expect(prompt).toBe(expected);
  });

  it('averages ensemble members under the average policy', async () => {
    const client = new ScriptedClient(['4', 'Score: 6', '7']);
    const config = testConfig({ ensemble: true, aggregation: 'average' });
    await expect(scoreContent(['x'], 'y?', config, client)).resolves.toBe(6);
  });

  it('honours a non-default ensemble size', async () => {
    const client = new ScriptedClient(['1', '2', '3', '4', '5']);
    const config = testConfig({ ensemble: true, ensembleSize: 5, aggregation: 'average' });
    await expect(scoreContent(['x'], 'y?', config, client)).resolves.toBe(3);
    expect(client.prompts).toHaveLength(5);
  });

  it('gives an unparseable member the neutral score without aborting the ensemble', async () => {
    const client = new ScriptedClient(['no idea', '9', '9']);
    const config = testConfig({ ensemble: true });
    const out = await scoreContentDetailed(['x'], 'y?', config, client);
    expect(out).toEqual({ score: 9, samples: [5, 9, 9], fallbacks: 1 });
  });

  it('returns the fallback for a single unparseable reply', async () => {
    const client = new ScriptedClient(['I would rather not say.']);
    const out = await scoreContentDetailed(['x'], 'y?', testConfig(), client);
    expect(out).toEqual({ score: 5, samples: [5], fallbacks: 1 });
  });

  it('propagates endpoint errors and stops issuing calls', async () => {
    const client = new ScriptedClient(['8', new EndpointError('upstream down', { status: 503 }), '8']);
    const config = testConfig({ ensemble: true });
    await expect(scoreContentDetailed(['x'], 'y?', config, client)).rejects.toBeInstanceOf(EndpointError);
    expect(client.prompts).toHaveLength(2);
  });

  it('rejects empty content before calling the endpoint', async () => {
    const client = new ScriptedClient(['8']);
    await expect(scoreContentDetailed([], 'y?', testConfig(), client)).rejects.toBeInstanceOf(PreconditionError);
    expect(client.prompts).toHaveLength(0);
  });

  it('rejects a non-positive ensemble size', async () => {
    const client = new ScriptedClient(['8']);
    const config = testConfig({ ensemble: true, ensembleSize: 0 });
    await expect(scoreContentDetailed(['x'], 'y?', config, client)).rejects.toThrow('ensembleSize must be a positive integer');
    expect(client.prompts).toHaveLength(0);
  });
});
