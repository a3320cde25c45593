// Inline stylesheets: the archive has to open straight from disk, with no asset pipeline.

const BASE = `
* { margin: 0; padding: 0; box-sizing: border-box; }
body {
  font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial, sans-serif;
  line-height: 1.6;
  color: #333;
  background: #f5f5f5;
}
.header { background: #2563eb; color: #fff; padding: 32px 40px; }
`;

export const EMAIL_PAGE_STYLES = `${BASE}
.container { max-width: 1000px; margin: 0 auto; background: #fff; min-height: 100vh; }
.header h1 { font-size: 24px; margin-bottom: 16px; line-height: 1.3; }
.meta { font-size: 14px; background: rgba(255,255,255,0.12); padding: 12px 16px; border-radius: 6px; }
.meta div { margin: 4px 0; }
.content { padding: 32px 40px; }
.back { display: inline-block; margin-bottom: 24px; padding: 10px 20px; background: #2563eb; color: #fff; text-decoration: none; border-radius: 6px; }
.body-text { white-space: pre-wrap; background: #f9fafb; padding: 24px; border-left: 4px solid #2563eb; border-radius: 6px; }
.body-text a, .body-html a { color: #1d4ed8; }
.body-html { padding: 24px; border: 1px solid #e5e7eb; border-radius: 6px; overflow-x: auto; }
.body-html img { max-width: 100%; height: auto; }
.attachments { margin-top: 28px; padding: 20px; background: #fff8e1; border-left: 4px solid #f59e0b; border-radius: 6px; }
.attachments h3 { margin-bottom: 12px; font-size: 16px; color: #92400e; }
.attachments ul { list-style: none; }
.attachments li { padding: 8px 0; border-bottom: 1px solid #fde68a; }
.attachments li:last-child { border-bottom: none; }
.attachments a { color: #1e3a8a; text-decoration: none; }
`;

export const INDEX_PAGE_STYLES = `${BASE}
.header { text-align: center; }
.header h1 { font-size: 32px; font-weight: 600; }
.stats { font-size: 15px; margin-top: 8px; }
.search-container { max-width: 900px; margin: 32px auto 24px; padding: 0 20px; }
.search-box { width: 100%; padding: 14px 22px; font-size: 16px; border: 2px solid #d1d5db; border-radius: 999px; outline: none; }
.search-box:focus { border-color: #2563eb; }
.container { max-width: 900px; margin: 0 auto 48px; padding: 0 20px; }
.email-list { list-style: none; }
.email-item a { display: block; background: #fff; margin-bottom: 12px; padding: 20px 24px; border-radius: 10px; border: 1px solid #eee; color: inherit; text-decoration: none; }
.email-item a:hover { border-color: #2563eb; }
.email-subject { font-size: 17px; font-weight: 600; color: #111827; }
.email-meta { font-size: 14px; color: #6b7280; }
.email-preview { font-size: 14px; color: #9ca3af; margin-top: 8px; }
.attachment-badge { display: inline-block; margin-left: 10px; padding: 2px 8px; border-radius: 4px; font-size: 12px; background: #fff8e1; color: #92400e; }
.no-results { text-align: center; padding: 60px 20px; color: #6b7280; }
`;
