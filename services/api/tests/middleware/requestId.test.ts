import { resolveRequestId } from '../../src/middleware/requestId';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

jest.mock('../../src/lib/logger', () => ({
  runWithRequestContext: <T>(_requestId: string, fn: () => T): T => fn(),
}));

describe('resolveRequestId', () => {
  it('whenHeaderIsPlainToken_reusesIt', () => {
    expect(resolveRequestId('req-123')).toBe('req-123');
  });

  it('whenHeaderHasSurroundingWhitespace_trimsIt', () => {
    expect(resolveRequestId('  trace:42  ')).toBe('trace:42');
  });

  it('whenHeaderMissing_generatesUuid', () => {
    expect(resolveRequestId(undefined)).toMatch(UUID_V4);
  });

  it('whenHeaderBlank_generatesUuid', () => {
    expect(resolveRequestId('   ')).toMatch(UUID_V4);
  });

  it('whenHeaderContainsUnsafeCharacters_generatesUuid', () => {
    expect(resolveRequestId('id\nforged=1')).toMatch(UUID_V4);
  });

  it('whenHeaderTooLong_generatesUuid', () => {
    expect(resolveRequestId('a'.repeat(129))).toMatch(UUID_V4);
  });
});
