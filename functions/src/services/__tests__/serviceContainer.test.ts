import * as functions from 'firebase-functions';
import { createFakeTerminologyClient } from '../../__tests__/helpers/fakeTerminologyClient';
import { PrescriptionAnalyzer } from '../domain/prescriptions/PrescriptionAnalyzer';
import { createServiceContainer } from '../domain/serviceContainer';
import { RxNavClient } from '../rxnorm/rxnavClient';

describe('createServiceContainer', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('wires the RxNav client by default and marks unconfigured capabilities unavailable', () => {
    const container = createServiceContainer();

    expect(container.terminologyClient).toBeInstanceOf(RxNavClient);
    expect(container.prescriptionAnalyzer).toBeInstanceOf(PrescriptionAnalyzer);
    expect(container.capabilities).toEqual({ modelExtraction: false, ocrBackends: [] });
    expect(functions.logger.warn).toHaveBeenCalledTimes(3);
  });

  it('uses injected collaborators', () => {
    const terminologyClient = createFakeTerminologyClient();
    const container = createServiceContainer({
      terminologyClient,
      entityTagger: { tag: jest.fn() },
      primaryOcrBackend: { name: 'primary', extract: jest.fn() },
      secondaryOcrBackend: null,
    });

    expect(container.terminologyClient).toBe(terminologyClient);
    expect(container.capabilities).toEqual({ modelExtraction: true, ocrBackends: ['primary'] });
  });
});
