/**
 * Telegram bot: /start, the help button and URL messages
 */
import { Bot, GrammyError, HttpError, type BotConfig, type Context } from 'grammy';
import { logger } from '../observability/logger.js';
import {
    parseMediaRequest,
    runPipeline,
    type DeliveryResult,
    type PipelineContext,
} from '../pipeline/index.js';
import { createTelegramDelivery, helpKeyboard } from './delivery.js';
import { HELP_CALLBACK, HELP_TEXT, STATUS_DOWNLOADING, startText } from './messages.js';

/**
 * Handle one text message. Text that is not a URL gets no reply at all.
 */
export async function handleTextMessage(
    ctx: Context,
    pipeline: PipelineContext
): Promise<DeliveryResult | null> {
    const request = parseMediaRequest(ctx.message?.text ?? '');
    if (!request) {
        return null;
    }

    const status = await ctx.reply(STATUS_DOWNLOADING);
    const log = pipeline.logger.child({ chatId: status.chat.id, userId: ctx.from?.id });
    const delivery = createTelegramDelivery(
        ctx.api,
        { chatId: status.chat.id, messageId: status.message_id },
        log
    );

    return runPipeline(request, delivery, { ...pipeline, logger: log });
}

export function createBot(token: string, pipeline: PipelineContext, config?: BotConfig<Context>): Bot {
    const bot = new Bot(token, config);
    const maxFileSizeMb = Math.round(pipeline.maxFileSizeBytes / (1024 * 1024));

    bot.command('start', async (ctx) => {
        await ctx.reply(startText(maxFileSizeMb), {
            parse_mode: 'HTML',
            reply_markup: helpKeyboard(),
        });
    });

    bot.callbackQuery(HELP_CALLBACK, async (ctx) => {
        await ctx.answerCallbackQuery();
        await ctx.reply(HELP_TEXT, { parse_mode: 'HTML' });
    });

    bot.on('message:text', async (ctx) => {
        await handleTextMessage(ctx, pipeline);
    });

    bot.catch((err) => {
        const updateId = err.ctx.update.update_id;
        const error = err.error;

        if (error instanceof GrammyError) {
            logger.error('Telegram API error', error, { updateId, description: error.description, code: error.error_code });
        } else if (error instanceof HttpError) {
            logger.error('Telegram network error', error, { updateId });
        } else {
            logger.error('Unhandled bot error', error, { updateId });
        }
    });

    return bot;
}
