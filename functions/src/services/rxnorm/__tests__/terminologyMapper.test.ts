import { createFakeTerminologyClient } from '../../../__tests__/helpers/fakeTerminologyClient';
import { TerminologyRequestError } from '../errors';
import { TerminologyMapper, sanitizeDrugName } from '../terminologyMapper';

describe('TerminologyMapper', () => {
  it('sanitizes drug names down to letters, digits, whitespace and hyphens', () => {
    expect(sanitizeDrugName(' Co-trimoxazole (480mg)! ')).toBe('Co-trimoxazole 480mg');
    expect(sanitizeDrugName('!!!')).toBe('');
  });

  it('returns nothing for a name that sanitizes to empty, without a lookup', async () => {
    const client = createFakeTerminologyClient();
    const mapper = new TerminologyMapper(client);

    await expect(mapper.search('!!!')).resolves.toEqual([]);
    expect(client.resolve).not.toHaveBeenCalled();
    expect(client.searchDrugs).not.toHaveBeenCalled();
  });

  it('describes resolved identifiers and keeps the query for undescribed ones', async () => {
    const client = createFakeTerminologyClient();
    client.resolve.mockResolvedValue(['1191', '243670']);
    client.describe.mockImplementation(async (rxcui) =>
      rxcui === '1191' ? { name: 'aspirin', synonym: 'ASA' } : null,
    );
    const mapper = new TerminologyMapper(client);

    await expect(mapper.search(' Aspirin ')).resolves.toEqual([
      { rxcui: '1191', name: 'aspirin', synonym: 'ASA', confidence: 0.9 },
      { rxcui: '243670', name: 'Aspirin', confidence: 0.7 },
    ]);
    expect(client.resolve).toHaveBeenCalledWith('Aspirin');
    expect(client.searchDrugs).not.toHaveBeenCalled();
  });

  it('limits identifier mappings to maxResults', async () => {
    const client = createFakeTerminologyClient();
    client.resolve.mockResolvedValue(['1', '2', '3']);
    const mapper = new TerminologyMapper(client);

    const mappings = await mapper.search('Metformin', 2);

    expect(mappings.map((mapping) => mapping.rxcui)).toEqual(['1', '2']);
    expect(client.describe).toHaveBeenCalledTimes(2);
  });

  it('retries a rejected name once in sanitized form', async () => {
    const client = createFakeTerminologyClient();
    client.resolve
      .mockRejectedValueOnce(new TerminologyRequestError('bad request', 400))
      .mockResolvedValueOnce(['5640']);
    const mapper = new TerminologyMapper(client);

    await expect(mapper.resolveIdentifiers('Ibuprofen (Advil)')).resolves.toEqual(['5640']);
    expect(client.resolve.mock.calls).toEqual([['Ibuprofen (Advil)'], ['Ibuprofen Advil']]);
  });

  it('does not retry when the sanitized name is unchanged', async () => {
    const client = createFakeTerminologyClient();
    client.resolve.mockRejectedValue(new TerminologyRequestError('bad request', 400));
    const mapper = new TerminologyMapper(client);

    await expect(mapper.resolveIdentifiers('Ibuprofen')).resolves.toEqual([]);
    expect(client.resolve).toHaveBeenCalledTimes(1);
  });

  it('does not retry on other failures and falls through to fuzzy search', async () => {
    const client = createFakeTerminologyClient();
    client.resolve.mockRejectedValue(new TerminologyRequestError('unavailable', 500));
    client.searchDrugs.mockResolvedValue([{ rxcui: '42', name: 'ibuprofen 200 MG Oral Tablet' }]);
    const mapper = new TerminologyMapper(client);

    await expect(mapper.search('Ibuprofen (Advil)', 1)).resolves.toEqual([
      { rxcui: '42', name: 'ibuprofen 200 MG Oral Tablet', confidence: 0.6 },
    ]);
    expect(client.resolve).toHaveBeenCalledTimes(1);
    expect(client.approximateTerm).not.toHaveBeenCalled();
  });

  it('adds approximate matches after drug search results', async () => {
    const client = createFakeTerminologyClient();
    client.searchDrugs.mockResolvedValue([{ rxcui: '10', name: 'ibuprofen 400 MG Oral Tablet' }]);
    client.approximateTerm.mockResolvedValue([{ rxcui: '10' }, { rxcui: '11' }]);
    const mapper = new TerminologyMapper(client);

    await expect(mapper.search('Ibuprofin')).resolves.toEqual([
      { rxcui: '10', name: 'ibuprofen 400 MG Oral Tablet', confidence: 0.6 },
      { rxcui: '11', name: 'Ibuprofin', confidence: 0.5 },
    ]);
    expect(client.approximateTerm).toHaveBeenCalledWith('Ibuprofin', 5);
  });

  it('returns nothing when every fuzzy lookup fails', async () => {
    const client = createFakeTerminologyClient();
    client.searchDrugs.mockRejectedValue(new TerminologyRequestError('timeout'));
    client.approximateTerm.mockRejectedValue(new TerminologyRequestError('timeout'));
    const mapper = new TerminologyMapper(client);

    await expect(mapper.search('Unknownium')).resolves.toEqual([]);
  });
});
