import { assembleContext } from '../../src/services/context.service';

describe('assembleContext', () => {
  it('whenGivenTwoDocuments_joinsBlocksWithBlankLine', () => {
    const context = assembleContext([
      { title: 'A', content: 'x' },
      { title: 'B', content: 'y' },
    ]);

    expect(context).toBe('Title: A\nContent: x\n\nTitle: B\nContent: y');
  });

  it('whenInputIsReordered_keepsInputOrder', () => {
    const context = assembleContext([
      { title: 'B', content: 'y' },
      { title: 'A', content: 'x' },
    ]);

    expect(context).toBe('Title: B\nContent: y\n\nTitle: A\nContent: x');
  });

  it('whenDocumentsCarryExtras_ignoresThem', () => {
    const context = assembleContext([
      { title: 'A', content: 'x', url: 'https://docs.example.com/a', similarity: 0.9 },
    ]);

    expect(context).toBe('Title: A\nContent: x');
  });

  it('whenEmpty_returnsEmptyString', () => {
    expect(assembleContext([])).toBe('');
  });

  it('whenCalledTwice_returnsSameResultWithoutMutatingInput', () => {
    const docs = [{ title: 'A', content: 'multi\nline' }];

    const first = assembleContext(docs);
    const second = assembleContext(docs);

    expect(first).toBe(second);
    expect(docs).toEqual([{ title: 'A', content: 'multi\nline' }]);
  });
});
