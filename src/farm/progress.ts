import { describeLinkStatus, isLinkSuccess } from '@/farm/links';
import type { FarmEvent, LinkStatus, StepStatus } from '@/farm/types';

export type ProgressTone = 'success' | 'failure' | 'skipped';

export type ProgressLine = {
  id: string;
  label: string;
  tone: ProgressTone;
  detail?: string;
};

const MARKERS: Record<'emoji' | 'plain', Record<ProgressTone, string>> = {
  emoji: { success: '✔', failure: '❎', skipped: '➖' },
  plain: { success: '[ok]', failure: '[x]', skipped: '[-]' },
};

export const progressMarker = (tone: ProgressTone, emoji: boolean): string =>
  MARKERS[emoji ? 'emoji' : 'plain'][tone];

const stepTone = (status: StepStatus): ProgressTone => {
  if (status === 'succeeded') {
    return 'success';
  }
  return status === 'denied' ? 'skipped' : 'failure';
};

const linkTone = (status: LinkStatus): ProgressTone =>
  isLinkSuccess(status) ? 'success' : 'failure';

export const stepKey = (category: string, repository: string, step: string): string =>
  `${category}/${repository}:${step}`;

/** Maps a finished step or link to the line kept on screen; started steps yield nothing. */
export const toProgressLine = (event: FarmEvent, index: number): ProgressLine | null => {
  switch (event.type) {
    case 'step-started':
      return null;
    case 'step-finished':
      return {
        id: `${stepKey(event.category, event.repository, event.step)}#${index}`,
        label: `${event.repository}: ${event.step}`,
        tone: stepTone(event.status),
        detail: event.status === 'denied' ? 'not permitted' : event.error,
      };
    case 'link-finished': {
      const { result } = event;
      const detail = result.error
        ? `${describeLinkStatus(result.status)}: ${result.error}`
        : describeLinkStatus(result.status);
      return {
        id: `${result.category}/${result.key}#${index}`,
        label: `${result.link.name}: link`,
        tone: linkTone(result.status),
        detail,
      };
    }
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
};
