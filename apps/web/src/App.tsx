import { useEffect, useMemo, useState } from 'react';

import { apiDelete, apiGet, apiPost, apiUpload } from './api';
import { AudienceTab } from './components/AudienceTab';
import { BrandMatchesTab } from './components/BrandMatchesTab';
import { ChartsTab } from './components/ChartsTab';
import { Footer } from './components/Footer';
import { OverviewTab } from './components/OverviewTab';
import { ReportTab } from './components/ReportTab';
import { Topbar } from './components/Topbar';
import { UploadPanel } from './components/UploadPanel';
import { WelcomeScreen } from './components/WelcomeScreen';
import type { AnalysisView, SessionView } from './types';
import { DEFAULT_MAX_UPLOAD_BYTES, validateVideoFile } from './upload';
import { canDownloadReport, RESULT_TABS, selectScreen } from './viewState';
import type { TabId } from './viewState';

const SESSION_PATH = '/api/v1/session';

type Busy = 'loading' | 'uploading' | 'analyzing' | 'resetting' | null;

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function App() {
  const [session, setSession] = useState<SessionView | null>(null);
  const [result, setResult] = useState<AnalysisView | null>(null);
  const [busy, setBusy] = useState<Busy>('loading');
  const [notice, setNotice] = useState<string | null>(null);
  const [activeTab, setActiveTab] = useState<TabId>('overview');
  const [resultVersion, setResultVersion] = useState(0);

  const maxUploadBytes = session?.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  const screen = useMemo(() => selectScreen(session, result), [session, result]);

  useEffect(() => {
    void (async () => {
      try {
        const current = await apiGet<SessionView>(SESSION_PATH);
        setSession(current);
        if (current.status === 'displayed') {
          setResult(await apiGet<AnalysisView>(`${SESSION_PATH}/analysis`));
        }
      } catch (e) {
        setNotice(errorMessage(e));
      } finally {
        setBusy(null);
      }
    })();
  }, []);

  async function refreshSession() {
    try {
      setSession(await apiGet<SessionView>(SESSION_PATH));
    } catch (e) {
      setNotice(errorMessage(e));
    }
  }

  async function uploadVideo(file: File) {
    const check = validateVideoFile(file, maxUploadBytes);
    if (!check.ok) {
      setNotice(check.message);
      return;
    }

    setBusy('uploading');
    setNotice(null);
    setResult(null);
    try {
      setSession(await apiUpload<SessionView>(`${SESSION_PATH}/video`, 'video', file));
    } catch (e) {
      setNotice(errorMessage(e));
      await refreshSession();
    } finally {
      setBusy(null);
    }
  }

  async function analyze() {
    setBusy('analyzing');
    setNotice(null);
    try {
      const next = await apiPost<AnalysisView>(`${SESSION_PATH}/analysis`);
      setResult(next);
      setResultVersion((v) => v + 1);
      setActiveTab('overview');
    } catch (e) {
      setResult(null);
      setNotice(errorMessage(e));
    } finally {
      await refreshSession();
      setBusy(null);
    }
  }

  async function reset() {
    setBusy('resetting');
    setNotice(null);
    try {
      setSession(await apiDelete<SessionView>(SESSION_PATH));
      setResult(null);
    } catch (e) {
      setNotice(errorMessage(e));
    } finally {
      setBusy(null);
    }
  }

  return (
    <div className="container">
      <Topbar
        canReset={Boolean(session?.upload)}
        busy={busy !== null}
        onReset={() => void reset()}
      />

      <div className="layout">
        <UploadPanel
          maxUploadBytes={maxUploadBytes}
          upload={session?.upload ?? null}
          uploading={busy === 'uploading'}
          analyzing={busy === 'analyzing'}
          onSelectFile={(file) => void uploadVideo(file)}
          onAnalyze={() => void analyze()}
        />

        <main className="main">
          {notice && screen.kind !== 'failed' ? (
            <div className="errorBox">{notice}</div>
          ) : null}

          {busy === 'loading' ? <p className="muted">Loading…</p> : null}
          {busy === 'analyzing' ? (
            <p className="muted">Analyzing your content…</p>
          ) : null}

          {screen.kind === 'welcome' && busy !== 'loading' ? (
            <WelcomeScreen maxUploadBytes={maxUploadBytes} />
          ) : null}

          {screen.kind === 'ready' && busy === null ? (
            <p className="muted">
              Video uploaded. Click &quot;Analyze Brand Compatibility&quot; to
              continue.
            </p>
          ) : null}

          {screen.kind === 'failed' ? (
            <div className="errorBox">{screen.message}</div>
          ) : null}

          {screen.kind === 'results' ? (
            <>
              <nav className="tabs" role="tablist">
                {RESULT_TABS.map((tab) => (
                  <button
                    key={tab.id}
                    type="button"
                    role="tab"
                    aria-selected={activeTab === tab.id}
                    className={activeTab === tab.id ? 'tab active' : 'tab'}
                    onClick={() => setActiveTab(tab.id)}
                  >
                    {tab.label}
                  </button>
                ))}
              </nav>

              {activeTab === 'overview' ? (
                <OverviewTab analysis={screen.result.analysis} />
              ) : null}
              {activeTab === 'audience' ? (
                <AudienceTab analysis={screen.result.analysis} />
              ) : null}
              {activeTab === 'brands' ? (
                <BrandMatchesTab analysis={screen.result.analysis} />
              ) : null}
              {activeTab === 'charts' ? (
                <ChartsTab charts={screen.result.charts} />
              ) : null}
              {activeTab === 'report' && canDownloadReport(screen) ? (
                <ReportTab key={resultVersion} />
              ) : null}
            </>
          ) : null}
        </main>
      </div>

      <Footer />
    </div>
  );
}
