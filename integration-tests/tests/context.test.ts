/**
 * Context Propagation Tests
 */

import { asyncLocalStorage, getContext, runWithContext, runForDocument } from '@aqlparse/shared';

describe('runForDocument', () => {
  it('should keep the batch correlation and set the document', () => {
    const context = runWithContext({ correlationId: 'corr-1', batchId: 'batch-1' }, () =>
      runForDocument('a.pdf', () => getContext())
    );

    expect(context).toEqual({ correlationId: 'corr-1', batchId: 'batch-1', documentId: 'a.pdf' });
  });

  it('should restore the parent context afterwards', () => {
    const context = runWithContext({ correlationId: 'corr-2' }, () => {
      runForDocument('b.pdf', () => undefined);
      return getContext();
    });

    expect(context).toEqual({ correlationId: 'corr-2' });
  });
});

describe('asyncLocalStorage', () => {
  it('should hold the context set by runWithContext', () => {
    const store = runWithContext({ correlationId: 'corr-3' }, () => asyncLocalStorage.getStore());

    expect(store).toEqual({ correlationId: 'corr-3' });
    expect(asyncLocalStorage.getStore()).toBeUndefined();
  });
});
