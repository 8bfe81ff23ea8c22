import { createExecutionContext, ExecutionContext } from '../../src/core/context';
import { Inventory, Products } from '../../src/core/types';

export function testContext(options: { requestId?: string; timeoutMs?: number } = {}): ExecutionContext {
  return createExecutionContext({
    requestId: options.requestId ?? 'test-request',
    timeoutMs: options.timeoutMs ?? 5000,
  }).context;
}

export function abortedContext(reason: Error = new Error('caller gave up')): ExecutionContext {
  const handle = createExecutionContext({ requestId: 'aborted-request', timeoutMs: 5000 });
  handle.abort(reason);
  return handle.context;
}

// Oak Stool: 3 legs + 6 screws; Pine Shelf: 4 screws + 2 boards
export const sampleProducts: Products = {
  products: [
    {
      name: 'Oak Stool',
      containArticles: [
        { artId: 'A1', amountOf: 3 },
        { artId: 'A2', amountOf: 6 },
      ],
    },
    {
      name: 'Pine Shelf',
      containArticles: [
        { artId: 'A2', amountOf: 4 },
        { artId: 'A3', amountOf: 2 },
      ],
    },
  ],
};

export const sampleInventory: Inventory = {
  inventory: [
    { artId: 'A1', name: 'leg', stock: 6 },
    { artId: 'A2', name: 'screw', stock: 10 },
    { artId: 'A3', name: 'board', stock: 1 },
  ],
};
