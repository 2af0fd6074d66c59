import { advanceOrder, isOrderComplete, parsePages, FlowLimits, IncomingFile } from './order.flow';
import { OrderData, OrderStep, Session } from '../types/session';

describe('order flow', () => {
  const limits: FlowLimits = { maxFilesPerOrder: 2 };

  const createSession = (step: OrderStep, orderData: OrderData = {}): Session => ({
    userId: 42,
    step,
    orderData,
    files: [],
    createdAt: new Date('2026-03-02T09:00:00Z'),
    lastActivityAt: new Date('2026-03-02T09:00:00Z'),
  });

  const createFile = (overrides: Partial<IncomingFile> = {}): IncomingFile => ({
    kind: 'document',
    ref: 'file-ref-1',
    name: 'brief.pdf',
    sizeBytes: 4096,
    ...overrides,
  });

  describe('parsePages', () => {
    it.each<[string, number]>([
      ['5', 5],
      [' 12 ', 12],
      ['1', 1],
      ['50', 50],
    ])('accepts %p', (body, expected) => {
      expect(parsePages(body)).toBe(expected);
    });

    it.each(['0', '51', 'five', '', '3.5', '-2', '2 pages'])('rejects %p', (body) => {
      expect(parsePages(body)).toBeUndefined();
    });
  });

  describe('subject', () => {
    it('stores the subject and moves to the level step', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_SUBJECT), { kind: 'text', body: ' Game theory ' }, limits);

      expect(result).toEqual({ outcome: 'advance', step: OrderStep.ORDER_LEVEL, patch: { subject: 'Game theory' } });
    });

    it('rejects blank text', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_SUBJECT), { kind: 'text', body: '   ' }, limits);

      expect(result).toEqual({ outcome: 'reject', reason: 'empty-text' });
    });
  });

  describe('level', () => {
    it('stores a catalog level', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_LEVEL), { kind: 'level', key: 'bachelor' }, limits);

      expect(result).toEqual({ outcome: 'advance', step: OrderStep.ORDER_PAGES, patch: { level: 'bachelor' } });
    });

    it('ignores an unknown level', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_LEVEL), { kind: 'level', key: 'kindergarten' }, limits);

      expect(result.outcome).toBe('ignore');
    });

    it('asks for buttons when text arrives', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_LEVEL), { kind: 'text', body: 'bachelor' }, limits);

      expect(result).toEqual({ outcome: 'reject', reason: 'use-buttons' });
    });
  });

  describe('pages', () => {
    it('moves to the deadline step on a valid count', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_PAGES), { kind: 'text', body: '5' }, limits);

      expect(result).toEqual({ outcome: 'advance', step: OrderStep.ORDER_DEADLINE, patch: { pages: 5 } });
    });

    it.each(['abc', '0', '51'])('rejects %p', (body) => {
      const result = advanceOrder(createSession(OrderStep.ORDER_PAGES), { kind: 'text', body }, limits);

      expect(result).toEqual({ outcome: 'reject', reason: 'invalid-pages' });
    });
  });

  describe('deadline', () => {
    it('locks the price computed from the stored level and pages', () => {
      const session = createSession(OrderStep.ORDER_DEADLINE, { subject: 'X', level: 'bachelor', pages: 2 });

      const result = advanceOrder(session, { kind: 'deadline', key: '24h' }, limits);

      expect(result).toEqual({
        outcome: 'advance',
        step: OrderStep.ORDER_INSTRUCTIONS,
        patch: { deadline: '24h', finalPrice: 66 },
      });
    });

    it('applies the ceiling', () => {
      const session = createSession(OrderStep.ORDER_DEADLINE, { level: 'phd', pages: 3 });

      const result = advanceOrder(session, { kind: 'deadline', key: '6h' }, limits);

      expect(result).toEqual({
        outcome: 'advance',
        step: OrderStep.ORDER_INSTRUCTIONS,
        patch: { deadline: '6h', finalPrice: 150 },
      });
    });

    it('ignores an unknown deadline', () => {
      const session = createSession(OrderStep.ORDER_DEADLINE, { level: 'phd', pages: 3 });

      expect(advanceOrder(session, { kind: 'deadline', key: '1y' }, limits).outcome).toBe('ignore');
    });

    it('never recomputes a locked price', () => {
      const session = createSession(OrderStep.ORDER_DEADLINE, { level: 'phd', pages: 3, finalPrice: 150 });

      expect(advanceOrder(session, { kind: 'deadline', key: '7d' }, limits).outcome).toBe('ignore');
    });

    it('ignores a deadline press outside the deadline step', () => {
      const session = createSession(OrderStep.ORDER_INSTRUCTIONS, { level: 'phd', pages: 3, finalPrice: 150 });

      expect(advanceOrder(session, { kind: 'deadline', key: '7d' }, limits).outcome).toBe('ignore');
    });
  });

  describe('instructions', () => {
    it('accepts any text, including "none"', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_INSTRUCTIONS), { kind: 'text', body: 'none' }, limits);

      expect(result).toEqual({ outcome: 'advance', step: OrderStep.ORDER_FILES, patch: { instructionsText: 'none' } });
    });
  });

  describe('files', () => {
    it('attaches a document', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_FILES), { kind: 'file', file: createFile() }, limits);

      expect(result).toMatchObject({
        outcome: 'attach',
        capReached: false,
        file: { externalFileRef: 'file-ref-1', fileName: 'brief.pdf', sizeBytes: 4096, kind: 'document' },
      });
    });

    it('names unnamed images by position', () => {
      const session = createSession(OrderStep.ORDER_FILES);
      const file = createFile({ kind: 'image', name: undefined });

      const result = advanceOrder(session, { kind: 'file', file }, limits);

      expect(result).toMatchObject({ outcome: 'attach', file: { fileName: 'image_1.jpg', kind: 'image' } });
    });

    it('reports when the upload reaches the cap', () => {
      const session = createSession(OrderStep.ORDER_FILES);
      session.files.push({
        externalFileRef: 'first',
        fileName: 'first.pdf',
        sizeBytes: 10,
        kind: 'document',
        uploadedAt: new Date(),
      });

      const result = advanceOrder(session, { kind: 'file', file: createFile() }, limits);

      expect(result).toMatchObject({ outcome: 'attach', capReached: true });
    });

    it('rejects uploads once the cap is reached', () => {
      const session = createSession(OrderStep.ORDER_FILES);
      for (const name of ['a.pdf', 'b.pdf']) {
        session.files.push({ externalFileRef: name, fileName: name, sizeBytes: 10, kind: 'document', uploadedAt: new Date() });
      }

      const result = advanceOrder(session, { kind: 'file', file: createFile() }, limits);

      expect(result).toEqual({ outcome: 'reject', reason: 'file-limit' });
    });

    it('rejects unsupported kinds', () => {
      const result = advanceOrder(
        createSession(OrderStep.ORDER_FILES),
        { kind: 'file', file: createFile({ kind: 'voice' }) },
        limits
      );

      expect(result).toEqual({ outcome: 'reject', reason: 'unsupported-file' });
    });

    it('rejects files over 20 MiB', () => {
      const result = advanceOrder(
        createSession(OrderStep.ORDER_FILES),
        { kind: 'file', file: createFile({ sizeBytes: 20 * 1024 * 1024 + 1 }) },
        limits
      );

      expect(result).toEqual({ outcome: 'reject', reason: 'file-too-large' });
    });

    it('accepts a file of exactly 20 MiB', () => {
      const result = advanceOrder(
        createSession(OrderStep.ORDER_FILES),
        { kind: 'file', file: createFile({ sizeBytes: 20 * 1024 * 1024 }) },
        limits
      );

      expect(result.outcome).toBe('attach');
    });

    it('rejects files outside the files step', () => {
      const result = advanceOrder(createSession(OrderStep.ORDER_PAGES), { kind: 'file', file: createFile() }, limits);

      expect(result).toEqual({ outcome: 'reject', reason: 'file-not-expected' });
    });

    it('rejects files without a session', () => {
      expect(advanceOrder(undefined, { kind: 'file', file: createFile() }, limits)).toEqual({
        outcome: 'reject',
        reason: 'file-not-expected',
      });
    });
  });

  it('reports a missing session for text', () => {
    expect(advanceOrder(undefined, { kind: 'text', body: 'hello' }, limits)).toEqual({ outcome: 'no-session' });
  });

  describe('isOrderComplete', () => {
    it('requires every priced field', () => {
      const complete = createSession(OrderStep.ORDER_FILES, {
        subject: 'X',
        level: 'bachelor',
        pages: 2,
        deadline: '24h',
        finalPrice: 66,
      });

      expect(isOrderComplete(complete)).toBe(true);
      expect(isOrderComplete(createSession(OrderStep.ORDER_FILES, { subject: 'X', level: 'bachelor' }))).toBe(false);
    });
  });
});
