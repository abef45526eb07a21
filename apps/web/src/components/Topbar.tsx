type Props = {
  canReset: boolean;
  busy: boolean;
  onReset: () => void;
};

export function Topbar({ canReset, busy, onReset }: Props) {
  return (
    <div className="topbar">
      <div className="brand">
        <h1 className="mainTitle">🎯 Brand Media Analyzer</h1>
      </div>
      <div className="topbarRight">
        {canReset ? (
          <button
            className="secondary"
            type="button"
            disabled={busy}
            onClick={onReset}
          >
            Start over
          </button>
        ) : null}
      </div>
    </div>
  );
}
