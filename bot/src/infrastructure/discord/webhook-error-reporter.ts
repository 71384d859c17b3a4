import { AttachmentBuilder, WebhookClient } from 'discord.js';
import { createLogger } from '@vibingway/logger';
import type { CommandErrorContext, ErrorReporter } from '../../application/ports/error-reporter.js';
import { notice, type NoticeField } from '../../application/ports/notifier.js';
import { errorMessage } from '../../errors.js';
import { buildEmbed } from '../../presentation/ui/embeds.js';
import { truncate } from '../../utils/string.js';

const log = createLogger('error-reporter');

const TRACE_FIELD_LENGTH = 990;

export function describeError(error: unknown): { name: string; trace: string } {
  if (error instanceof Error) {
    return { name: error.name, trace: error.stack ?? `${error.name}: ${error.message}` };
  }
  return { name: typeof error, trace: String(error) };
}

/**
 * Sends command error reports to the logging webhook. Traces too long for an
 * embed field are attached as a text file.
 */
export class WebhookErrorReporter implements ErrorReporter {
  private readonly webhook: WebhookClient;

  constructor(url: string, private readonly username: string = 'Vibingway') {
    this.webhook = new WebhookClient({ url });
  }

  async report(error: unknown, context: CommandErrorContext): Promise<void> {
    const { name, trace } = describeError(error);
    const fields: NoticeField[] = [
      { name: 'Author', value: context.userTag, inline: false },
      { name: 'Channel', value: context.channelId ? `<#${context.channelId}>` : 'Unknown' },
      { name: 'Error', value: `${name}: ${truncate(errorMessage(error), 200)}`, inline: false },
      { name: 'Traceback', value: `\`\`\`\n${truncate(trace, TRACE_FIELD_LENGTH)}\`\`\``, inline: false },
    ];

    const embed = buildEmbed(notice.failure(`Error report for command \`/${context.command}\`.`, { fields })).setTimestamp();
    const files = trace.length > 1000
      ? [new AttachmentBuilder(Buffer.from(trace, 'utf8'), { name: `error_${Date.now()}.txt` })]
      : [];

    try {
      await this.webhook.send({ username: this.username, embeds: [embed], files });
    } catch (sendError) {
      log.error({ error: errorMessage(sendError) }, 'Failed to send command error through webhook');
    }
  }

  destroy(): void {
    this.webhook.destroy();
  }
}
