import appConfig, { BankAccount } from '../config/env';
import {
  ACADEMIC_LEVELS,
  AcademicLevel,
  CEILING_PER_PAGE,
  CRYPTO_CURRENCIES,
  DEADLINE_OPTIONS,
  MAX_PAGES,
  MIN_PAGES,
  WORDS_PER_PAGE,
  cryptoCodes,
  deadlineKeys,
  levelKeys,
} from '../config/catalog';
import { RejectReason } from '../handlers/order.flow';
import { formatFileSize, formatMultiplier, formatPrice } from './pricing.service';
import {
  ChatUser,
  Keyboard,
  KeyboardButton,
  OperatorNotification,
  PaymentMethod,
  RenderedMessage,
} from '../types/conversation';
import { AttachmentDescriptor, OrderStep, Session } from '../types/session';
import { escapeHtml, truncate } from '../utils/html';

/**
 * Read-only projection of a completed order, rebuilt from the session on every render
 */
export interface OrderSummary {
  subject: string;
  level: AcademicLevel;
  pages: number;
  deadlineLabel: string;
  instructions?: string;
  files: readonly AttachmentDescriptor[];
  finalPrice: number;
}

export interface NotificationSettings {
  maxFilesPerOrder: number;
  supportDisplayName: string;
  bankAccount: BankAccount;
  cryptoAddresses: Record<string, string>;
}

const NO_INSTRUCTIONS = 'none';
const SUMMARY_INSTRUCTIONS_LENGTH = 50;
// Keeps the operator notification under the 4096 character message limit
const OPERATOR_SUBJECT_LENGTH = 200;
const OPERATOR_INSTRUCTIONS_LENGTH = 3000;

/**
 * Builds the summary of a session, or undefined while fields are still missing
 */
export function buildOrderSummary(session: Session): OrderSummary | undefined {
  const { subject, level, pages, deadline, instructionsText, finalPrice } = session.orderData;
  if (subject === undefined || !level || pages === undefined || !deadline || finalPrice === undefined) {
    return undefined;
  }

  const instructions =
    instructionsText && instructionsText.toLowerCase() !== NO_INSTRUCTIONS ? instructionsText : undefined;

  return {
    subject,
    level: ACADEMIC_LEVELS[level],
    pages,
    deadlineLabel: DEADLINE_OPTIONS[deadline].label,
    instructions,
    files: session.files,
    finalPrice,
  };
}

const button = (label: string, action: KeyboardButton['action']): KeyboardButton => ({ label, action });

const MENU_BUTTON = button('🏠 Menu', { kind: 'menu' });
const BACK_ROW: KeyboardButton[] = [button('← Back', { kind: 'back' }), MENU_BUTTON];
const MENU_ONLY: Keyboard = [[MENU_BUTTON]];
const CONTINUE_TO_SUMMARY: Keyboard = [[button('✅ Continue to summary', { kind: 'order-summary' })]];

/**
 * NotificationService renders every message the bot sends: user prompts,
 * the order summary, payment instructions and operator notifications.
 * It never touches the session store.
 */
export class NotificationService {
  constructor(private readonly settings: NotificationSettings) {}

  welcome(): RenderedMessage {
    return {
      text:
        '📚 <b>ScribeDesk - Academic Services</b>\n\n' +
        'Professional academic writing platform.\n\n' +
        '<b>Services:</b>\n' +
        '• Academic papers\n' +
        '• Research and analysis\n' +
        '• Proofreading and editing\n\n' +
        '<b>Guarantees:</b>\n' +
        '• Plagiarism-free work\n' +
        '• Deadlines met\n' +
        '• Support included',
      keyboard: [[button('Open the service', { kind: 'menu' })]],
    };
  }

  mainMenu(): RenderedMessage {
    return {
      text: '🎯 <b>Main menu</b>\n\nChoose an action:',
      keyboard: this.mainKeyboard(),
    };
  }

  pricing(): RenderedMessage {
    const levels = levelKeys()
      .map((key) => {
        const level = ACADEMIC_LEVELS[key];
        return `• ${level.glyph} ${level.name}: ${formatPrice(level.basePrice)}`;
      })
      .join('\n');
    const deadlines = deadlineKeys()
      .map((key) => {
        const option = DEADLINE_OPTIONS[key];
        return `• ${option.label}: ${formatMultiplier(option.multiplier)}`;
      })
      .join('\n');

    return {
      text:
        `💰 <b>Pricing</b>\n\n<b>Base price per page (${WORDS_PER_PAGE} words):</b>\n${levels}\n\n` +
        `<b>Deadline adjustments:</b>\n${deadlines}\n\n` +
        `<i>Maximum price: ${formatPrice(CEILING_PER_PAGE)}/page</i>`,
      keyboard: [[button('📝 Place an order', { kind: 'new-order' })], [MENU_BUTTON]],
    };
  }

  info(): RenderedMessage {
    return {
      text:
        'ℹ️ <b>Information</b>\n\n' +
        '<b>How it works:</b>\n' +
        '1. Describe your project\n' +
        '2. Choose level and deadline\n' +
        '3. Send your files (optional)\n' +
        '4. Make the payment\n' +
        '5. Receive your paper\n\n' +
        '<b>Support:</b> available 24/7',
      keyboard: [[button('📝 Start', { kind: 'new-order' })], [MENU_BUTTON]],
    };
  }

  supportPrompt(): RenderedMessage {
    return {
      text: '💬 <b>Support</b>\n\nOur team is available 24/7.\n\n<b>Type your message below:</b>',
      keyboard: MENU_ONLY,
    };
  }

  lostNavigation(): RenderedMessage {
    return { text: '🤔 <b>Lost?</b>\n\nUse the menu below:', keyboard: this.mainKeyboard() };
  }

  sessionExpired(): RenderedMessage {
    return { text: '⚠️ <b>Session expired</b>\n\nPlease start again.', keyboard: MENU_ONLY };
  }

  transientError(): RenderedMessage {
    return { text: '⚠️ <b>Temporary error</b>\n\nPlease try again.', keyboard: MENU_ONLY };
  }

  /**
   * Prompt shown when the session enters its current step
   */
  stepPrompt(session: Session): RenderedMessage {
    const { orderData } = session;

    switch (session.step) {
      case OrderStep.ORDER_SUBJECT:
        return {
          text:
            '📝 <b>New order - Step 1/6</b>\n\n' +
            '<b>Describe the subject of your paper:</b>\n\n' +
            '<i>Example: Comparative analysis of European monetary policies</i>\n\n' +
            'Be as precise as possible.',
          keyboard: [BACK_ROW],
        };

      case OrderStep.ORDER_LEVEL:
        return {
          text:
            '📝 <b>New order - Step 2/6</b>\n\n' +
            `<b>Subject saved:</b>\n<i>${escapeHtml(orderData.subject ?? '')}</i>\n\n` +
            'Select your academic level:',
          keyboard: [
            ...levelKeys().map((key) => {
              const level = ACADEMIC_LEVELS[key];
              return [button(`${level.glyph} ${level.name}`, { kind: 'level', key })];
            }),
            BACK_ROW,
          ],
        };

      case OrderStep.ORDER_PAGES: {
        const level = orderData.level ? ACADEMIC_LEVELS[orderData.level] : undefined;
        const levelLines = level
          ? `<b>Selected level:</b> ${level.glyph} ${level.name}\n` +
            `<b>Base price:</b> ${formatPrice(level.basePrice)}/page\n\n`
          : '';
        return {
          text:
            `📝 <b>New order - Step 3/6</b>\n\n${levelLines}` +
            `<b>How many pages do you need?</b>\n<i>(One page is about ${WORDS_PER_PAGE} words)</i>`,
          keyboard: [BACK_ROW],
        };
      }

      case OrderStep.ORDER_DEADLINE:
        return {
          text:
            '📝 <b>New order - Step 4/6</b>\n\n' +
            `<b>${orderData.pages ?? 0} page(s) confirmed</b>\n\n` +
            'Select your delivery deadline:',
          keyboard: [
            ...deadlineKeys().map((key) => [button(DEADLINE_OPTIONS[key].label, { kind: 'deadline', key })]),
            BACK_ROW,
          ],
        };

      case OrderStep.ORDER_INSTRUCTIONS:
        return {
          text:
            '📋 <b>New order - Step 5/6</b>\n\n' +
            '<b>Additional instructions</b>\n\n' +
            'Type everything that matters:\n' +
            '• Required format (APA, MLA, ...)\n' +
            '• Minimum number of sources\n' +
            '• Specific guidelines\n\n' +
            `<i>If you have no instructions, type "${NO_INSTRUCTIONS}"</i>`,
          keyboard: [BACK_ROW],
        };

      case OrderStep.ORDER_FILES:
        return {
          text:
            '📎 <b>New order - Step 6/6</b>\n\n' +
            '<b>Documents and resources (optional)</b>\n\n' +
            'You can:\n' +
            '• Send files (PDF, DOC, images)\n' +
            '• Go straight to the summary\n\n' +
            `<b>Files sent:</b> ${session.files.length}/${this.settings.maxFilesPerOrder}`,
          keyboard: [[button('↩ Skip this step', { kind: 'skip-files' })], BACK_ROW],
        };

      case OrderStep.PAYMENT_SELECTION: {
        const summary = buildOrderSummary(session);
        return summary ? this.orderSummary(summary) : this.sessionExpired();
      }

      case OrderStep.SUPPORT:
        return this.supportPrompt();

      case OrderStep.MENU:
        return this.mainMenu();
    }
  }

  /**
   * Corrective message for an input the current step does not accept
   */
  rejection(reason: RejectReason): RenderedMessage {
    switch (reason) {
      case 'empty-text':
        return { text: '⚠️ <b>Empty message</b>\n\nPlease describe the subject of your paper.' };
      case 'invalid-pages':
        return {
          text: `⚠️ <b>Incorrect format</b>\n\nEnter a number between ${MIN_PAGES} and ${MAX_PAGES}.\n<i>Example: 5</i>`,
        };
      case 'use-buttons':
        return { text: 'Please use the buttons above to continue.', keyboard: MENU_ONLY };
      case 'file-not-expected':
        return { text: '⚠️ <b>File not expected</b>\n\nUse the menu to navigate.', keyboard: MENU_ONLY };
      case 'file-limit':
        return {
          text: `⚠️ <b>Limit reached</b>\n\nMaximum ${this.settings.maxFilesPerOrder} files per order.`,
          keyboard: CONTINUE_TO_SUMMARY,
        };
      case 'unsupported-file':
        return { text: '⚠️ <b>Unsupported file type</b>\n\nSend documents or images.' };
      case 'file-too-large':
        return { text: '⚠️ <b>File too large</b>\n\nMaximum size: 20 MB' };
    }
  }

  fileAdded(session: Session, file: AttachmentDescriptor): RenderedMessage {
    const count = session.files.length;
    const max = this.settings.maxFilesPerOrder;
    const header =
      '✅ <b>File added</b>\n\n' +
      `📎 ${escapeHtml(file.fileName)} (${formatFileSize(file.sizeBytes)})\n\n` +
      `<b>Total:</b> ${count}/${max} files\n\n`;

    if (count >= max) {
      return { text: `${header}File limit reached, here is your summary.` };
    }
    return {
      text: `${header}You can send more files or continue.`,
      keyboard: CONTINUE_TO_SUMMARY,
    };
  }

  orderSummary(summary: OrderSummary): RenderedMessage {
    const instructions = summary.instructions
      ? escapeHtml(truncate(summary.instructions, SUMMARY_INSTRUCTIONS_LENGTH))
      : 'None';

    return {
      text:
        '📋 <b>Order summary</b>\n\n' +
        `<b>Subject:</b> ${escapeHtml(summary.subject)}\n` +
        `<b>Level:</b> ${summary.level.glyph} ${summary.level.name}\n` +
        `<b>Pages:</b> ${summary.pages} page(s)\n` +
        `<b>Deadline:</b> ${summary.deadlineLabel}\n` +
        `<b>Instructions:</b> ${instructions}\n` +
        `<b>Attached files:</b> ${summary.files.length} document(s)\n\n` +
        `<b>💰 Total price:</b> ${formatPrice(summary.finalPrice)}\n\n` +
        'Choose your payment method:',
      keyboard: [
        [button('🏦 Bank transfer', { kind: 'pay-transfer' })],
        [button('₿ Cryptocurrency', { kind: 'pay-crypto' })],
        BACK_ROW,
      ],
    };
  }

  cryptoSelection(): RenderedMessage {
    return {
      text: '₿ <b>Cryptocurrency payment</b>\n\nSelect your currency:',
      keyboard: [
        ...cryptoCodes().map((code) => [button(`${CRYPTO_CURRENCIES[code].glyph} ${code}`, { kind: 'crypto', code })]),
        BACK_ROW,
      ],
    };
  }

  paymentInstructions(summary: OrderSummary, method: PaymentMethod, orderRef: string): RenderedMessage {
    const amount = formatPrice(summary.finalPrice);
    let text: string;

    if (method.kind === 'bank-transfer') {
      const account = this.settings.bankAccount;
      text =
        '🏦 <b>Payment by bank transfer</b>\n\n' +
        `<b>Order #${orderRef}</b>\n\n` +
        '<b>Bank details:</b>\n' +
        `• IBAN: ${escapeHtml(account.iban)}\n` +
        `• BIC: ${escapeHtml(account.bic)}\n` +
        `• Account holder: ${escapeHtml(account.holder)}\n` +
        `• Bank: ${escapeHtml(account.bank)}\n\n` +
        `<b>Exact amount:</b> ${amount}\n\n` +
        '<b>⚠️ IMPORTANT:</b>\n' +
        `• Use ${orderRef} as the transfer reference\n` +
        '• Keep your bank receipt\n' +
        '• Validation within 24-48 business hours';
    } else {
      const currency = CRYPTO_CURRENCIES[method.code];
      const address = this.settings.cryptoAddresses[method.code] ?? '';
      text =
        `₿ <b>${currency.name} payment ${currency.glyph}</b>\n\n` +
        `<b>Order #${orderRef}</b>\n\n` +
        '<b>Payment address:</b>\n' +
        `<code>${escapeHtml(address)}</code>\n\n` +
        `<b>Exact amount:</b> ${amount}\n\n` +
        '<b>⚠️ IMPORTANT:</b>\n' +
        '• Send the EXACT amount\n' +
        '• Keep your transaction hash\n' +
        '• Validation within 30 minutes';
    }

    return {
      text,
      keyboard: [[button('✅ Payment sent', { kind: 'payment-done', orderRef })], [MENU_BUTTON]],
    };
  }

  paymentDeclared(orderRef: string): RenderedMessage {
    return {
      text:
        '🙏 <b>Thank you!</b>\n\n' +
        `We have been notified of your payment for order #${escapeHtml(orderRef)}. ` +
        'You will hear from us once it is confirmed.',
      keyboard: MENU_ONLY,
    };
  }

  supportConfirmation(threadRef: string): RenderedMessage {
    return {
      text:
        '✅ <b>Message sent</b>\n\n' +
        `<b>Reference:</b> #${threadRef}\n` +
        '<b>Response time:</b> within 2 hours\n\n' +
        'Our team will get back to you shortly.',
      keyboard: MENU_ONLY,
    };
  }

  supportDeliveryFailed(): RenderedMessage {
    return { text: '⚠️ <b>Sending failed</b>\n\nPlease try again later.', keyboard: MENU_ONLY };
  }

  /** Operator reply, as delivered to the user */
  supportReply(text: string): RenderedMessage {
    return { text: `💬 <b>${escapeHtml(this.settings.supportDisplayName)}</b>\n\n${escapeHtml(text)}` };
  }

  operatorSupportMessage(user: ChatUser, threadRef: string, text: string): RenderedMessage {
    return {
      text:
        `💬 <b>SUPPORT MESSAGE</b> - Thread #${threadRef}\n\n` +
        `<b>👤 Client:</b> ${this.clientLabel(user)}\n\n` +
        `<b>📝 Message:</b>\n${escapeHtml(text)}`,
    };
  }

  operatorOrderNotification(
    user: ChatUser,
    summary: OrderSummary,
    method: PaymentMethod,
    orderRef: string
  ): OperatorNotification {
    const filesCount = summary.files.length;
    const payment = method.kind === 'bank-transfer' ? '🏦 Bank transfer' : `₿ Crypto (${method.code})`;

    let text =
      `🆕 <b>NEW ORDER #${orderRef}</b>\n\n` +
      `<b>👤 Client:</b> ${this.clientLabel(user)}\n\n` +
      '<b>📋 Details:</b>\n' +
      `• <b>Subject:</b> ${escapeHtml(truncate(summary.subject, OPERATOR_SUBJECT_LENGTH))}\n` +
      `• <b>Level:</b> ${summary.level.name}\n` +
      `• <b>Pages:</b> ${summary.pages}\n` +
      `• <b>Deadline:</b> ${summary.deadlineLabel}\n` +
      `• <b>Price:</b> ${formatPrice(summary.finalPrice)}\n` +
      `• <b>Payment:</b> ${payment}\n` +
      `• <b>Attached files:</b> ${filesCount} document(s)\n\n`;

    if (summary.instructions) {
      text += `<b>📝 Instructions:</b>\n${escapeHtml(truncate(summary.instructions, OPERATOR_INSTRUCTIONS_LENGTH))}\n\n`;
    }
    text += '⏳ <i>Awaiting payment...</i>';

    return {
      text,
      attachments: summary.files.map((file, index) => ({
        fileRef: file.externalFileRef,
        kind: file.kind,
        caption: `📎 <b>File ${index + 1}/${filesCount}</b> - ${orderRef}\n${escapeHtml(file.fileName)}`,
      })),
    };
  }

  operatorPaymentDeclared(user: ChatUser, orderRef: string): RenderedMessage {
    return {
      text:
        `💸 <b>PAYMENT REPORTED</b> - Order #${escapeHtml(orderRef)}\n\n` +
        `<b>👤 Client:</b> ${this.clientLabel(user)}\n\n` +
        'The client reports having sent the payment. Please verify it.',
    };
  }

  replyUsage(): RenderedMessage {
    return {
      text:
        '<b>Usage:</b> <code>/reply user_id message</code>\n' +
        '<b>Example:</b> <code>/reply 123456789 Hello, how can I help you?</code>',
    };
  }

  invalidUserId(): RenderedMessage {
    return { text: '⚠️ <b>Invalid user id</b>' };
  }

  replySent(userId: number): RenderedMessage {
    return { text: `✅ <b>Reply sent</b> to user ${userId}` };
  }

  replyFailed(reason: string): RenderedMessage {
    return { text: `⚠️ <b>Error:</b> ${escapeHtml(reason)}` };
  }

  private mainKeyboard(): Keyboard {
    return [
      [button('📝 New order', { kind: 'new-order' })],
      [button('💰 Pricing', { kind: 'pricing' }), button('💬 Support', { kind: 'support' })],
      [button('ℹ️ Information', { kind: 'info' })],
    ];
  }

  private clientLabel(user: ChatUser): string {
    const name = user.username ? `@${escapeHtml(user.username)}` : escapeHtml(user.firstName || 'No username');
    return `${name} (ID: <code>${user.id}</code>)`;
  }
}

// Export singleton instance
export default new NotificationService({
  maxFilesPerOrder: appConfig.maxFilesPerOrder,
  supportDisplayName: appConfig.supportDisplayName,
  bankAccount: appConfig.bankAccount,
  cryptoAddresses: appConfig.cryptoAddresses,
});
