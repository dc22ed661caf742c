import { ok, stubAxios } from '../../../__tests__/helpers/axiosStub';
import { HuggingFaceEntityTagger } from '../entityTagger';

const options = {
  baseUrl: 'https://tagger.test',
  model: 'test-model',
  apiToken: 'test-secret',
  timeoutMs: 1000,
  retryDelayMs: 0,
};

describe('HuggingFaceEntityTagger', () => {
  let stub: ReturnType<typeof stubAxios> | undefined;

  afterEach(() => {
    stub?.restore();
    stub = undefined;
  });

  it('refuses to construct without a token', () => {
    expect(() => new HuggingFaceEntityTagger({ ...options, apiToken: '' })).toThrow(
      'Entity tagger API token is not configured',
    );
  });

  it('posts the text to the model endpoint and maps spans', async () => {
    stub = stubAxios(() =>
      ok([
        { entity_group: 'Medication', word: ' aspirin ', score: 0.97 },
        { entity: 'B-Dosage', word: '100mg', score: 0.8 },
      ]),
    );
    const tagger = new HuggingFaceEntityTagger(options);

    await expect(tagger.tag('aspirin 100mg')).resolves.toEqual([
      { label: 'MEDICATION', text: 'aspirin', score: 0.97 },
      { label: 'DOSAGE', text: '100mg', score: 0.8 },
    ]);

    const [request] = stub.requests;
    expect(request.url).toBe('/models/test-model');
    expect(request.headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(String(request.data))).toEqual({
      inputs: 'aspirin 100mg',
      parameters: { aggregation_strategy: 'simple' },
    });
  });

  it('retries once while the model is loading', async () => {
    let calls = 0;
    stub = stubAxios(() => {
      calls += 1;
      return calls === 1 ? { status: 503, data: { error: 'loading' } } : ok([]);
    });
    const tagger = new HuggingFaceEntityTagger(options);

    await expect(tagger.tag('aspirin')).resolves.toEqual([]);
    expect(stub.requests).toHaveLength(2);
  });

  it('does not retry other failures', async () => {
    stub = stubAxios(() => ({ status: 401, data: { error: 'unauthorized' } }));
    const tagger = new HuggingFaceEntityTagger(options);

    await expect(tagger.tag('aspirin')).rejects.toThrow('Request failed with status code 401');
    expect(stub.requests).toHaveLength(1);
  });

  it('rejects a malformed response', async () => {
    stub = stubAxios(() => ok({ unexpected: true }));
    const tagger = new HuggingFaceEntityTagger(options);

    await expect(tagger.tag('aspirin')).rejects.toThrow('Entity tagger returned a malformed response');
  });
});
