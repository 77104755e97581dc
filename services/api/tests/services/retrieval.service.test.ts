import { PgVectorRetriever, MatchQueryService } from '../../src/services/retrieval.service';
import { Queryable } from '../../src/services/database.service';

jest.mock('../../src/lib/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

describe('PgVectorRetriever', () => {
  const db: Queryable = { query: jest.fn() };
  let sqlQueries: jest.Mocked<MatchQueryService>;
  let retriever: PgVectorRetriever;

  beforeEach(() => {
    sqlQueries = {
      matchDocuments: jest.fn(),
    };
    retriever = new PgVectorRetriever(db, sqlQueries);
  });

  describe('retrieve', () => {
    it('whenStoreReturnsRows_mapsThemInStoreOrder', async () => {
      sqlQueries.matchDocuments.mockResolvedValue([
        { id: 7, title: 'Calls', content: 'Create a call with POST /calls', url: 'https://docs.example.com/calls', similarity: 0.91 },
        { id: 3, title: 'Agents', content: 'Agents hold a system prompt', similarity: 0.72 },
      ]);

      const docs = await retriever.retrieve([0.1, 0.2], { source: 'test_docs', matchCount: 5 });

      expect(docs).toEqual([
        { title: 'Calls', content: 'Create a call with POST /calls', url: 'https://docs.example.com/calls', similarity: 0.91 },
        { title: 'Agents', content: 'Agents hold a system prompt', similarity: 0.72 },
      ]);
      expect(sqlQueries.matchDocuments).toHaveBeenCalledWith(db, '[0.1,0.2]', 5, { source: 'test_docs' });
    });

    it('whenMatchCountOmitted_defaultsToFive', async () => {
      sqlQueries.matchDocuments.mockResolvedValue([]);

      await retriever.retrieve([1], { source: 'test_docs' });

      expect(sqlQueries.matchDocuments).toHaveBeenCalledWith(db, '[1]', 5, { source: 'test_docs' });
    });

    it('whenRowLacksTitleOrContent_dropsIt', async () => {
      sqlQueries.matchDocuments.mockResolvedValue([
        { title: 'Kept', content: 'body' },
        { title: null, content: 'orphan' },
        { title: 'No body' },
      ]);

      const docs = await retriever.retrieve([1], { source: 'test_docs' });

      expect(docs).toEqual([{ title: 'Kept', content: 'body' }]);
    });

    it('whenSimilarityIsNumericString_parsesIt', async () => {
      sqlQueries.matchDocuments.mockResolvedValue([{ title: 'A', content: 'x', similarity: '0.5' }]);

      const docs = await retriever.retrieve([1], { source: 'test_docs' });

      expect(docs).toEqual([{ title: 'A', content: 'x', similarity: 0.5 }]);
    });

    it('whenStoreReturnsMoreThanMatchCount_capsToMatchCount', async () => {
      sqlQueries.matchDocuments.mockResolvedValue(
        Array.from({ length: 8 }).map((_, i) => ({ title: `Doc ${i}`, content: `content ${i}` }))
      );

      const docs = await retriever.retrieve([1], { source: 'test_docs', matchCount: 5 });

      expect(docs).toHaveLength(5);
      expect(docs.map(doc => doc.title)).toEqual(['Doc 0', 'Doc 1', 'Doc 2', 'Doc 3', 'Doc 4']);
    });

    it('whenStoreFails_returnsEmptyList', async () => {
      sqlQueries.matchDocuments.mockRejectedValue(new Error('connection refused'));

      await expect(retriever.retrieve([1], { source: 'test_docs' })).resolves.toEqual([]);
    });
  });

  describe('retrieveWithOutcome', () => {
    it('whenStoreFails_reportsFailedWithReason', async () => {
      sqlQueries.matchDocuments.mockRejectedValue(new Error('connection refused'));

      const outcome = await retriever.retrieveWithOutcome([1], { source: 'test_docs' });

      expect(outcome).toEqual({
        status: 'failed',
        value: [],
        reason: 'Vector search failed: connection refused',
      });
    });

    it('whenStoreHasNoMatches_reportsOkWithEmptyList', async () => {
      sqlQueries.matchDocuments.mockResolvedValue([]);

      await expect(retriever.retrieveWithOutcome([1], { source: 'test_docs' })).resolves.toEqual({
        status: 'ok',
        value: [],
      });
    });

    it('whenMatchCountIsNotPositive_failsWithoutQuerying', async () => {
      const outcome = await retriever.retrieveWithOutcome([1], { source: 'test_docs', matchCount: 0 });

      expect(outcome).toEqual({
        status: 'failed',
        value: [],
        reason: 'Vector search failed: matchCount must be a positive integer, got 0',
      });
      expect(sqlQueries.matchDocuments).not.toHaveBeenCalled();
    });
  });
});
