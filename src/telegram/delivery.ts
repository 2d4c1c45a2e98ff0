/**
 * Telegram delivery channel for one request.
 * Replies in the chat of the original message and drives its status message.
 */
import { InlineKeyboard, InputFile } from 'grammy';
import type { Logger } from '../observability/logger.js';
import type { DeliveryChannel } from '../pipeline/types.js';
import { HELP_CALLBACK, STATUS_UPLOADING } from './messages.js';

/**
 * The Bot API calls a delivery makes. grammy's Api satisfies it.
 */
export interface TelegramApi {
    sendVideo(
        chatId: number,
        video: InputFile,
        other: { caption: string; supports_streaming: boolean; reply_markup: InlineKeyboard }
    ): Promise<unknown>;
    sendAudio(
        chatId: number,
        audio: InputFile,
        other: { caption: string; reply_markup: InlineKeyboard }
    ): Promise<unknown>;
    editMessageText(chatId: number, messageId: number, text: string): Promise<unknown>;
    deleteMessage(chatId: number, messageId: number): Promise<unknown>;
}

export interface StatusMessage {
    chatId: number;
    messageId: number;
}

export function helpKeyboard(): InlineKeyboard {
    return new InlineKeyboard().text('📚 Help', HELP_CALLBACK);
}

export function createTelegramDelivery(
    api: TelegramApi,
    status: StatusMessage,
    log: Logger
): DeliveryChannel {
    const { chatId, messageId } = status;

    async function setStatus(text: string): Promise<void> {
        try {
            await api.editMessageText(chatId, messageId, text);
        } catch (error) {
            log.debug('Could not update status message', { error });
        }
    }

    async function removeStatus(): Promise<void> {
        try {
            await api.deleteMessage(chatId, messageId);
        } catch (error) {
            log.debug('Could not delete status message', { error });
        }
    }

    return {
        async deliverVideo(path, caption, streaming) {
            await setStatus(STATUS_UPLOADING);
            await api.sendVideo(chatId, new InputFile(path), {
                caption,
                supports_streaming: streaming,
                reply_markup: helpKeyboard(),
            });
            await removeStatus();
        },

        async deliverAudio(path, caption) {
            await setStatus(STATUS_UPLOADING);
            await api.sendAudio(chatId, new InputFile(path), {
                caption,
                reply_markup: helpKeyboard(),
            });
            await removeStatus();
        },

        async reportFailure(message) {
            await api.editMessageText(chatId, messageId, message);
        },
    };
}
