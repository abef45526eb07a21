export function Footer() {
  return (
    <footer className="footer">
      <span>Brand Media Analyzer</span>
      <span className="footerLinks">
        <a href="/health" target="_blank" rel="noreferrer noopener">
          Status
        </a>
      </span>
    </footer>
  );
}
