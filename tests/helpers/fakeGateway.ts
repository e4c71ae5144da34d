/**
 * In-memory chat gateway recording every action instead of calling Telegram
 */

import type { FmtString } from 'telegraf/format';
import type { InlineKeyboardMarkup } from 'telegraf/types';
import type { ChatGateway, SendOptions } from '../../src/services/verdictEnforcer';

export interface SentMessage {
	chatId: number;
	text: string;
	replyTo?: number;
	keyboard?: InlineKeyboardMarkup;
}

export class FakeGateway implements ChatGateway {
	deleted: Array<{ chatId: number; messageId: number }> = [];
	restricted: Array<{ chatId: number; userId: number; untilDate: number }> = [];
	lifted: Array<{ chatId: number; userId: number }> = [];
	sent: SentMessage[] = [];

	/** Makes the matching action reject the way Telegram does without admin rights */
	failing = new Set<'delete' | 'restrict' | 'lift' | 'send'>();

	async deleteMessage(chatId: number, messageId: number): Promise<void> {
		this.fail('delete');
		this.deleted.push({ chatId, messageId });
	}

	async restrictMember(chatId: number, userId: number, untilDate: number): Promise<void> {
		this.fail('restrict');
		this.restricted.push({ chatId, userId, untilDate });
	}

	async liftMember(chatId: number, userId: number): Promise<void> {
		this.fail('lift');
		this.lifted.push({ chatId, userId });
	}

	async sendMessage(chatId: number, text: string | FmtString, options: SendOptions = {}): Promise<void> {
		this.fail('send');
		this.sent.push({
			chatId,
			text: typeof text === 'string' ? text : text.text,
			replyTo: options.replyTo,
			keyboard: options.keyboard,
		});
	}

	private fail(action: 'delete' | 'restrict' | 'lift' | 'send'): void {
		if (this.failing.has(action)) {
			throw new Error('400: Bad Request: not enough rights');
		}
	}
}
