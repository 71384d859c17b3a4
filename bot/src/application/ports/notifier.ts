export type NoticeTone = 'message' | 'success' | 'warning' | 'failure';

export interface NoticeField {
  name: string;
  value: string;
  inline?: boolean;
}

/**
 * Presentation-neutral message, rendered as an embed by the command layer.
 */
export interface Notice {
  tone: NoticeTone;
  description: string;
  title?: string;
  thumbnailUrl?: string;
  imageUrl?: string;
  footer?: string;
  fields?: NoticeField[];
}

export interface Notifier {
  send(channelId: string, notice: Notice): Promise<void>;
}

export const notice = {
  message: (description: string, extra: Omit<Notice, 'tone' | 'description'> = {}): Notice =>
    ({ tone: 'message', description, ...extra }),
  success: (description: string, extra: Omit<Notice, 'tone' | 'description'> = {}): Notice =>
    ({ tone: 'success', description, ...extra }),
  warning: (description: string, extra: Omit<Notice, 'tone' | 'description'> = {}): Notice =>
    ({ tone: 'warning', description, ...extra }),
  failure: (description: string, extra: Omit<Notice, 'tone' | 'description'> = {}): Notice =>
    ({ tone: 'failure', description, ...extra }),
};
