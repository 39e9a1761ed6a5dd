const STYLES = `
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
    color: #1e293b;
    background: #fff;
    overflow: hidden;
  }
  .container { display: flex; flex-direction: column; height: 100vh; height: 100dvh; }
  .header {
    display: flex; justify-content: space-between; align-items: center; gap: 12px;
    padding: 12px 20px; border-bottom: 1px solid #e2e8f0;
  }
  .header h1 { font-size: 20px; font-weight: 700; }
  .note-id {
    font-family: 'SF Mono', Menlo, Consolas, monospace; font-size: 12px;
    color: #94a3b8; background: #eff6ff; padding: 2px 8px; border-radius: 4px;
  }
  .note-id:empty { display: none; }
  .controls { display: flex; gap: 6px; }
  .btn {
    padding: 7px 14px; border: 1px solid #e2e8f0; border-radius: 6px;
    background: #fff; color: #64748b; font: inherit; font-size: 13px; cursor: pointer;
  }
  .btn:hover { color: #2563eb; border-color: #2563eb; }
  .btn-primary { background: #2563eb; border-color: #2563eb; color: #fff; }
  .btn-primary:hover { background: #1d4ed8; color: #fff; }
  .editor-wrap { flex: 1; display: flex; padding: 12px; min-height: 0; }
  textarea {
    flex: 1; resize: none; outline: none; padding: 20px;
    border: 1px solid #e2e8f0; border-radius: 12px; background: #f8fafc;
    font-family: 'SF Mono', Menlo, Consolas, monospace; font-size: 14px; line-height: 1.6;
  }
  textarea:focus { border-color: #2563eb; }
  .status-bar {
    display: flex; justify-content: space-between; padding: 8px 20px;
    font-size: 12px; color: #64748b; background: #eff6ff; border-top: 1px solid #e2e8f0;
  }
  .status-bar.error { color: #ef4444; }
  #printable { display: none; }
  @media print {
    .header, .editor-wrap, .status-bar { display: none !important; }
    body, .container { height: auto; overflow: visible; }
    #printable { display: block; white-space: pre-wrap; font-family: Menlo, monospace; padding: 0.5in; }
  }
`;

// Auto-save loop: posts JSON every second when the text changed, then moves the
// address bar to /noteid/<id> once the server has assigned an id.
const SCRIPT = `
  const basePath = window.location.pathname.replace(/\\/noteid\\/.*$/, '');
  const appBase = basePath.endsWith('/') ? basePath : basePath + '/';
  const textarea = document.getElementById('content');
  const statusBar = document.getElementById('statusBar');
  const statusText = document.getElementById('statusText');
  const noteInfo = document.getElementById('noteInfo');
  const printable = document.getElementById('printable');
  let currentNoteId = document.body.dataset.noteId || '';
  let lastSaved = textarea.value;
  let saving = false;

  function setStatus(text, isError) {
    statusText.textContent = text;
    statusBar.classList.toggle('error', Boolean(isError));
  }

  async function autoSave() {
    const value = textarea.value;
    if (saving || value === lastSaved) return;
    saving = true;
    setStatus('Saving...');
    try {
      const url = currentNoteId ? appBase + 'noteid/' + currentNoteId : appBase;
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ noteId: currentNoteId, content: value }),
      });
      const data = await response.json();
      if (!response.ok || !data.success) throw new Error(data.error || 'HTTP ' + response.status);
      lastSaved = value;
      currentNoteId = data.noteId;
      const notePath = appBase + 'noteid/' + currentNoteId;
      if (window.location.pathname !== notePath) {
        window.history.replaceState({}, '', notePath);
        noteInfo.textContent = currentNoteId;
      }
      setStatus('Saved');
    } catch (err) {
      setStatus('Error: ' + (err.message || 'Network error'), true);
    } finally {
      saving = false;
    }
  }

  async function copyText(text, done) {
    try {
      await navigator.clipboard.writeText(text);
      setStatus(done);
    } catch {
      setStatus('Could not copy', true);
    }
  }

  document.getElementById('newNote').addEventListener('click', () => { window.location.href = appBase; });
  document.getElementById('copyContent').addEventListener('click', () => copyText(textarea.value, 'Content copied'));
  document.getElementById('copyLink').addEventListener('click', () => {
    if (!currentNoteId) { setStatus('Save a note first'); return; }
    copyText(window.location.origin + appBase + 'noteid/' + currentNoteId, 'Link copied');
  });
  textarea.addEventListener('keydown', (e) => {
    if (e.key !== 'Tab') return;
    e.preventDefault();
    const start = textarea.selectionStart;
    textarea.setRangeText('\\t', start, textarea.selectionEnd, 'end');
  });
  textarea.addEventListener('input', () => { printable.textContent = textarea.value; });
  printable.textContent = textarea.value;
  setInterval(autoSave, 1000);
  textarea.focus();
`;

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * The interactive editor. Both values are HTML-escaped; the script reads them back
 * from the DOM rather than having them spliced into JavaScript.
 */
export function renderNotePage(noteId: string, content: string): string {
  const id = escapeHtml(noteId);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <link rel="icon" href="/favicon.ico">
  <title>Note</title>
  <style>${STYLES}</style>
</head>
<body data-note-id="${id}">
  <div class="container">
    <div class="header">
      <div>
        <h1>Note <span class="note-id" id="noteInfo">${id}</span></h1>
      </div>
      <div class="controls">
        <button class="btn btn-primary" id="newNote" title="New note">New</button>
        <button class="btn" id="copyContent" title="Copy content">Copy</button>
        <button class="btn" id="copyLink" title="Copy link">Link</button>
        <button class="btn" onclick="window.print()" title="Print">Print</button>
      </div>
    </div>
    <div class="editor-wrap">
      <textarea id="content" placeholder="Start typing your note...">${escapeHtml(content)}</textarea>
    </div>
    <div class="status-bar" id="statusBar"><span id="statusText">Ready</span></div>
  </div>
  <div id="printable"></div>
  <script>${SCRIPT}</script>
</body>
</html>`;
}
