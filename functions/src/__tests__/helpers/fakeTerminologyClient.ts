import type { TerminologyClient } from '../../services/rxnorm/rxnavClient';

/** Terminology client whose lookups all come back empty until a test says otherwise. */
export const createFakeTerminologyClient = (): jest.Mocked<TerminologyClient> => ({
  resolve: jest.fn().mockResolvedValue([]),
  describe: jest.fn().mockResolvedValue(null),
  searchDrugs: jest.fn().mockResolvedValue([]),
  approximateTerm: jest.fn().mockResolvedValue([]),
  interactions: jest.fn().mockResolvedValue([]),
});
