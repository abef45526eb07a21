import type { AnalysisView, SessionView } from './types';

export type TabId = 'overview' | 'audience' | 'brands' | 'charts' | 'report';

export const RESULT_TABS: ReadonlyArray<{ id: TabId; label: string }> = [
  { id: 'overview', label: '📊 Overview' },
  { id: 'audience', label: '👥 Audience Analysis' },
  { id: 'brands', label: '🎯 Brand Matches' },
  { id: 'charts', label: '📈 Visualization' },
  { id: 'report', label: '📄 Report' },
];

export type Screen =
  | { kind: 'welcome' }
  | { kind: 'ready'; session: SessionView }
  | { kind: 'results'; session: SessionView; result: AnalysisView }
  | { kind: 'failed'; session: SessionView; message: string };

/**
 * Picks what the main area shows. Results, and with them the report
 * download, only appear for a displayed session.
 */
export function selectScreen(
  session: SessionView | null,
  result: AnalysisView | null,
): Screen {
  if (session?.status === 'error' && session.failure) {
    return { kind: 'failed', session, message: session.failure.message };
  }

  if (!session || !session.upload) {
    return { kind: 'welcome' };
  }

  if (session.status === 'displayed' && result) {
    return { kind: 'results', session, result };
  }

  return { kind: 'ready', session };
}

export function canDownloadReport(screen: Screen): boolean {
  return screen.kind === 'results';
}
