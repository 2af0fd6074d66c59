import logger from '../config/logger';
import appConfig from '../config/env';
import { isCryptoCode } from '../config/catalog';
import sessionStore, { SessionStore } from '../services/session.service';
import notificationService, { NotificationService, buildOrderSummary } from '../services/notification.service';
import telegramService from '../services/telegram.service';
import {
  ButtonEvent,
  ChatTransport,
  CommandEvent,
  FileEvent,
  InboundEvent,
  PaymentMethod,
  RenderedMessage,
  TextEvent,
} from '../types/conversation';
import { OrderStep } from '../types/session';
import { describeError } from '../utils/AppError';
import { parseAction } from '../utils/actionCodec';
import { generateOrderReference, parseUserId, supportThreadReference } from '../utils/references';
import { FlowInput, advanceOrder } from './order.flow';

export interface ConversationSettings {
  operatorId: number;
  maxFilesPerOrder: number;
}

type EventWithInput = ButtonEvent | TextEvent | FileEvent;

/**
 * ConversationHandler drives one chat event to completion: it reads the
 * session, applies the order flow, writes the result back and sends the
 * rendered replies. Events must be handed over one at a time.
 */
export class ConversationHandler {
  constructor(
    private readonly store: SessionStore,
    private readonly transport: ChatTransport,
    private readonly composer: NotificationService,
    private readonly settings: ConversationSettings
  ) {}

  /**
   * Processes an inbound event. Never throws: failures are logged and the
   * user gets the generic error message with a way back to the menu.
   */
  async handleEvent(event: InboundEvent): Promise<void> {
    logger.info('Conversation event', { type: event.type, userId: event.user.id });

    try {
      await this.dispatch(event);
    } catch (error) {
      logger.error('Error handling conversation event', {
        type: event.type,
        userId: event.user.id,
        error: describeError(error),
        stack: error instanceof Error ? error.stack : undefined,
      });

      try {
        const message = this.composer.transientError();
        await this.transport.sendOrReplaceMessage(event.chatId, message.text, message.keyboard);
      } catch (sendError) {
        logger.error('Failed to send error message', {
          userId: event.user.id,
          error: describeError(sendError),
        });
      }
    }
  }

  private async dispatch(event: InboundEvent): Promise<void> {
    switch (event.type) {
      case 'start':
        return this.respond(event, this.composer.welcome());
      case 'menu':
        this.store.clear(event.user.id);
        return this.respond(event, this.composer.mainMenu());
      case 'button':
        return this.handleButton(event);
      case 'text':
        return this.handleText(event);
      case 'file':
        return this.applyFlow(event, {
          kind: 'file',
          file: { kind: event.kind, ref: event.ref, name: event.name, sizeBytes: event.sizeBytes },
        });
      case 'command':
        return this.handleCommand(event);
    }
  }

  private async handleButton(event: ButtonEvent): Promise<void> {
    await this.transport.acknowledge(event.callbackId);

    const userId = event.user.id;
    if (!event.data) {
      logger.debug(`Button without data from ${userId} acknowledged`);
      return;
    }
    const action = parseAction(event.data);
    logger.debug(`Button ${action.kind} from ${userId}`);

    switch (action.kind) {
      case 'menu':
      case 'back':
        this.store.clear(userId);
        return this.respond(event, this.composer.mainMenu());

      case 'new-order': {
        // Always a fresh session: unfinished order data is discarded
        const session = this.store.create(userId, OrderStep.ORDER_SUBJECT);
        return this.respond(event, this.composer.stepPrompt(session));
      }

      case 'pricing':
        return this.respond(event, this.composer.pricing());

      case 'info':
        return this.respond(event, this.composer.info());

      case 'support':
        this.store.update(userId, OrderStep.SUPPORT);
        return this.respond(event, this.composer.supportPrompt());

      case 'level':
        return this.applyFlow(event, { kind: 'level', key: action.key });

      case 'deadline':
        return this.applyFlow(event, { kind: 'deadline', key: action.key });

      case 'skip-files':
      case 'order-summary':
        return this.showSummary(event);

      case 'pay-transfer':
        return this.completePayment(event, { kind: 'bank-transfer' });

      case 'pay-crypto':
        return this.showCryptoSelection(event);

      case 'crypto':
        if (!isCryptoCode(action.code)) {
          logger.warn(`Unknown crypto-currency ${action.code} from ${userId}`);
          return;
        }
        return this.completePayment(event, { kind: 'crypto', code: action.code });

      case 'payment-done':
        return this.declarePayment(event, action.orderRef);

      case 'unknown':
        logger.warn(`Unknown action from ${userId}`, { data: action.raw });
        return this.respond(event, this.composer.transientError());
    }
  }

  private async handleText(event: TextEvent): Promise<void> {
    const session = this.store.get(event.user.id);
    if (session?.step === OrderStep.SUPPORT) {
      return this.relaySupportMessage(event);
    }
    return this.applyFlow(event, { kind: 'text', body: event.body });
  }

  /**
   * Runs an input through the order flow and applies the outcome
   */
  private async applyFlow(event: EventWithInput, input: FlowInput): Promise<void> {
    const userId = event.user.id;
    const session = this.store.get(userId);
    const result = advanceOrder(session, input, { maxFilesPerOrder: this.settings.maxFilesPerOrder });

    switch (result.outcome) {
      case 'advance': {
        const updated = this.store.update(userId, result.step, result.patch);
        logger.info(`Order step ${updated.step} for ${userId}`);
        return this.respond(event, this.composer.stepPrompt(updated));
      }

      case 'attach':
        if (!session || !this.store.appendFile(userId, result.file)) {
          return this.respond(event, this.composer.rejection('file-limit'));
        }
        logger.info(`File attached for ${userId}: ${session.files.length}/${this.settings.maxFilesPerOrder}`);
        await this.respond(event, this.composer.fileAdded(session, result.file));
        if (result.capReached) {
          await this.showSummary(event);
        }
        return;

      case 'reject':
        logger.warn(`Input rejected for ${userId}: ${result.reason}`);
        return this.respond(event, this.composer.rejection(result.reason));

      case 'ignore':
        logger.debug(`Input ignored for ${userId}: ${result.reason}`);
        // Stale buttons are only acknowledged; stray text gets the menu
        if (event.type === 'text') {
          return this.respond(event, this.composer.lostNavigation());
        }
        return;

      case 'no-session':
        return this.respond(
          event,
          event.type === 'button' ? this.composer.sessionExpired() : this.composer.lostNavigation()
        );
    }
  }

  /**
   * Renders the summary of a finished order and moves it to payment selection
   */
  private async showSummary(event: EventWithInput): Promise<void> {
    const userId = event.user.id;
    const session = this.store.get(userId);
    if (!session) {
      return this.respond(event, this.composer.sessionExpired());
    }
    if (session.step !== OrderStep.ORDER_FILES && session.step !== OrderStep.PAYMENT_SELECTION) {
      logger.debug(`Summary requested in ${session.step} by ${userId}, ignored`);
      return;
    }

    const summary = buildOrderSummary(session);
    if (!summary) {
      this.store.clear(userId);
      return this.respond(event, this.composer.sessionExpired());
    }

    this.store.update(userId, OrderStep.PAYMENT_SELECTION);
    return this.respond(event, this.composer.orderSummary(summary));
  }

  private async showCryptoSelection(event: ButtonEvent): Promise<void> {
    const session = this.store.get(event.user.id);
    if (!session) {
      return this.respond(event, this.composer.sessionExpired());
    }
    if (session.step !== OrderStep.PAYMENT_SELECTION) {
      logger.debug(`Crypto selection requested in ${session.step} by ${event.user.id}, ignored`);
      return;
    }
    return this.respond(event, this.composer.cryptoSelection());
  }

  /**
   * Issues the order reference, gives the user payment instructions,
   * notifies the operator and closes the session
   */
  private async completePayment(event: ButtonEvent, method: PaymentMethod): Promise<void> {
    const userId = event.user.id;
    const session = this.store.get(userId);
    if (!session) {
      return this.respond(event, this.composer.sessionExpired());
    }
    if (session.step !== OrderStep.PAYMENT_SELECTION) {
      logger.debug(`Payment requested in ${session.step} by ${userId}, ignored`);
      return;
    }

    const summary = buildOrderSummary(session);
    if (!summary) {
      this.store.clear(userId);
      return this.respond(event, this.composer.sessionExpired());
    }

    const orderRef = generateOrderReference();
    logger.info(`Order ${orderRef} placed by ${userId}`, {
      method: method.kind,
      price: summary.finalPrice,
      files: summary.files.length,
    });

    await this.respond(event, this.composer.paymentInstructions(summary, method, orderRef));

    const notification = this.composer.operatorOrderNotification(event.user, summary, method, orderRef);
    await this.sendToOperator(notification.text, `order ${orderRef}`);

    for (const attachment of notification.attachments) {
      try {
        await this.transport.sendAttachment(this.settings.operatorId, attachment);
      } catch (error) {
        logger.error(`Failed to forward file for order ${orderRef}`, {
          fileRef: attachment.fileRef,
          error: describeError(error),
        });
      }
    }

    this.store.clear(userId);
  }

  private async declarePayment(event: ButtonEvent, orderRef: string): Promise<void> {
    logger.info(`Payment declared for order ${orderRef} by ${event.user.id}`);
    await this.respond(event, this.composer.paymentDeclared(orderRef));
    await this.sendToOperator(
      this.composer.operatorPaymentDeclared(event.user, orderRef).text,
      `payment of ${orderRef}`
    );
  }

  /**
   * Forwards a support message to the operator under the user's thread of the day
   */
  private async relaySupportMessage(event: TextEvent): Promise<void> {
    const userId = event.user.id;
    const threadRef = supportThreadReference(userId);

    try {
      const message = this.composer.operatorSupportMessage(event.user, threadRef, event.body);
      await this.transport.sendOrReplaceMessage(this.settings.operatorId, message.text);
    } catch (error) {
      logger.error(`Failed to relay support message ${threadRef}`, { userId, error: describeError(error) });
      return this.respond(event, this.composer.supportDeliveryFailed());
    }

    logger.info(`Support message relayed for ${userId}`, { threadRef });
    this.store.clear(userId);
    return this.respond(event, this.composer.supportConfirmation(threadRef));
  }

  private async handleCommand(event: CommandEvent): Promise<void> {
    if (event.command !== 'reply') {
      logger.warn(`Unknown command /${event.command} from ${event.user.id}`);
      return this.respond(event, this.composer.transientError());
    }
    if (event.user.id !== this.settings.operatorId) {
      logger.warn(`Reply command from non-operator ${event.user.id} ignored`);
      return;
    }
    if (event.args.length < 2) {
      return this.respond(event, this.composer.replyUsage());
    }

    let targetId: number;
    try {
      targetId = parseUserId(event.args[0]);
    } catch (error) {
      logger.warn(describeError(error));
      return this.respond(event, this.composer.invalidUserId());
    }

    const reply = this.composer.supportReply(event.args.slice(1).join(' '));
    try {
      await this.transport.sendOrReplaceMessage(targetId, reply.text);
    } catch (error) {
      logger.error(`Failed to deliver operator reply to ${targetId}`, { error: describeError(error) });
      return this.respond(event, this.composer.replyFailed(describeError(error)));
    }

    logger.info(`Operator reply delivered to ${targetId}`);
    return this.respond(event, this.composer.replySent(targetId));
  }

  /**
   * Sends to the operator; failures are logged and never reach the user
   */
  private async sendToOperator(text: string, context: string): Promise<void> {
    try {
      await this.transport.sendOrReplaceMessage(this.settings.operatorId, text);
    } catch (error) {
      logger.error(`Failed to notify operator about ${context}`, { error: describeError(error) });
    }
  }

  /**
   * Replies in the event's chat. Button presses replace the message that carried the button.
   */
  private async respond(event: InboundEvent, message: RenderedMessage): Promise<void> {
    const replaceMessageId = event.type === 'button' ? event.messageId : undefined;
    await this.transport.sendOrReplaceMessage(event.chatId, message.text, message.keyboard, replaceMessageId);
  }
}

// Export singleton instance
export default new ConversationHandler(sessionStore, telegramService, notificationService, {
  operatorId: appConfig.operatorId,
  maxFilesPerOrder: appConfig.maxFilesPerOrder,
});
