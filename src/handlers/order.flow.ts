import {
  MAX_FILE_SIZE_BYTES,
  MAX_PAGES,
  MIN_PAGES,
  isDeadlineKey,
  isLevelKey,
} from '../config/catalog';
import { computePrice } from '../services/pricing.service';
import { IncomingFileKind } from '../types/conversation';
import { AttachmentDescriptor, OrderData, OrderStep, Session } from '../types/session';

/**
 * Order-flow transition table: (step × input kind) → validation, mutation, next step.
 * Pure: reads the session, never writes it. The conversation handler applies
 * the result to the session store.
 */

export interface IncomingFile {
  kind: IncomingFileKind;
  ref: string;
  name?: string;
  sizeBytes: number;
}

interface FlowInputMap {
  text: { body: string };
  level: { key: string };
  deadline: { key: string };
  file: { file: IncomingFile };
}

export type FlowInputKind = keyof FlowInputMap;
export type FlowInputOf<K extends FlowInputKind> = { kind: K } & FlowInputMap[K];
export type FlowInput = { [K in FlowInputKind]: FlowInputOf<K> }[FlowInputKind];

export type RejectReason =
  | 'empty-text'
  | 'invalid-pages'
  | 'use-buttons'
  | 'file-not-expected'
  | 'file-limit'
  | 'unsupported-file'
  | 'file-too-large';

export type FlowResult =
  | { outcome: 'advance'; step: OrderStep; patch: Partial<OrderData> }
  | { outcome: 'attach'; file: AttachmentDescriptor; capReached: boolean }
  | { outcome: 'reject'; reason: RejectReason }
  | { outcome: 'ignore'; reason: string }
  | { outcome: 'no-session' };

export interface FlowLimits {
  maxFilesPerOrder: number;
}

type TransitionRule<K extends FlowInputKind> = (
  session: Session,
  input: FlowInputOf<K>,
  limits: FlowLimits
) => FlowResult;

type StepRules = { [K in FlowInputKind]?: TransitionRule<K> };

const useButtons: TransitionRule<'text'> = () => ({ outcome: 'reject', reason: 'use-buttons' });

/**
 * Parses a page count typed by the user
 * @returns the count, or undefined unless it is a whole number in range
 */
export function parsePages(body: string): number | undefined {
  const trimmed = body.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const pages = parseInt(trimmed, 10);
  return pages >= MIN_PAGES && pages <= MAX_PAGES ? pages : undefined;
}

function acceptFile(session: Session, file: IncomingFile, limits: FlowLimits): FlowResult {
  if (session.files.length >= limits.maxFilesPerOrder) {
    return { outcome: 'reject', reason: 'file-limit' };
  }
  if (file.kind !== 'document' && file.kind !== 'image') {
    return { outcome: 'reject', reason: 'unsupported-file' };
  }
  if (file.sizeBytes > MAX_FILE_SIZE_BYTES) {
    return { outcome: 'reject', reason: 'file-too-large' };
  }

  const position = session.files.length + 1;
  const fallbackName = file.kind === 'image' ? `image_${position}.jpg` : 'document';

  return {
    outcome: 'attach',
    file: {
      externalFileRef: file.ref,
      fileName: file.name || fallbackName,
      sizeBytes: file.sizeBytes,
      kind: file.kind,
      uploadedAt: new Date(),
    },
    capReached: position >= limits.maxFilesPerOrder,
  };
}

const TRANSITIONS: Record<OrderStep, StepRules> = {
  [OrderStep.MENU]: {},
  [OrderStep.ORDER_SUBJECT]: {
    text: (_session, { body }) => {
      const subject = body.trim();
      if (!subject) {
        return { outcome: 'reject', reason: 'empty-text' };
      }
      return { outcome: 'advance', step: OrderStep.ORDER_LEVEL, patch: { subject } };
    },
  },
  [OrderStep.ORDER_LEVEL]: {
    level: (_session, { key }) => {
      if (!isLevelKey(key)) {
        return { outcome: 'ignore', reason: `unknown level ${key}` };
      }
      return { outcome: 'advance', step: OrderStep.ORDER_PAGES, patch: { level: key } };
    },
    text: useButtons,
  },
  [OrderStep.ORDER_PAGES]: {
    text: (_session, { body }) => {
      const pages = parsePages(body);
      if (pages === undefined) {
        return { outcome: 'reject', reason: 'invalid-pages' };
      }
      return { outcome: 'advance', step: OrderStep.ORDER_DEADLINE, patch: { pages } };
    },
  },
  [OrderStep.ORDER_DEADLINE]: {
    deadline: (session, { key }) => {
      const { level, pages, finalPrice } = session.orderData;
      if (!isDeadlineKey(key)) {
        return { outcome: 'ignore', reason: `unknown deadline ${key}` };
      }
      if (!level || pages === undefined) {
        return { outcome: 'ignore', reason: 'level or pages missing' };
      }
      if (finalPrice !== undefined) {
        return { outcome: 'ignore', reason: 'price already locked' };
      }
      return {
        outcome: 'advance',
        step: OrderStep.ORDER_INSTRUCTIONS,
        patch: { deadline: key, finalPrice: computePrice(level, key, pages) },
      };
    },
    text: useButtons,
  },
  [OrderStep.ORDER_INSTRUCTIONS]: {
    text: (_session, { body }) => ({
      outcome: 'advance',
      step: OrderStep.ORDER_FILES,
      patch: { instructionsText: body.trim() },
    }),
  },
  [OrderStep.ORDER_FILES]: {
    file: (session, { file }, limits) => acceptFile(session, file, limits),
    text: useButtons,
  },
  [OrderStep.PAYMENT_SELECTION]: {
    text: useButtons,
  },
  // Support messages are relayed by the handler, not through this table
  [OrderStep.SUPPORT]: {},
};

function applyRule<K extends FlowInputKind>(
  rules: StepRules,
  session: Session,
  input: FlowInputOf<K>,
  limits: FlowLimits
): FlowResult | undefined {
  const rule = rules[input.kind];
  return rule ? rule(session, input, limits) : undefined;
}

/**
 * Decides what an input does to the order in its current step
 */
export function advanceOrder(
  session: Session | undefined,
  input: FlowInput,
  limits: FlowLimits
): FlowResult {
  if (!session) {
    return input.kind === 'file'
      ? { outcome: 'reject', reason: 'file-not-expected' }
      : { outcome: 'no-session' };
  }

  const result = applyRule(TRANSITIONS[session.step], session, input, limits);
  if (result) {
    return result;
  }

  if (input.kind === 'file') {
    return { outcome: 'reject', reason: 'file-not-expected' };
  }
  return { outcome: 'ignore', reason: `${input.kind} not expected in ${session.step}` };
}

/**
 * Whether the session holds everything the summary and payment steps need
 */
export function isOrderComplete(session: Session): boolean {
  const { subject, level, pages, deadline, finalPrice } = session.orderData;
  return (
    subject !== undefined &&
    level !== undefined &&
    pages !== undefined &&
    deadline !== undefined &&
    finalPrice !== undefined
  );
}
