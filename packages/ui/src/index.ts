export { renderEmailPage, renderIndexPage, DEFAULT_ARCHIVE_TITLE, type RenderOptions } from './render';
export { EmailPage } from './components/EmailPage';
export { ArchiveIndexPage } from './components/ArchiveIndexPage';
export { linkifyText } from './lib/linkify';
export { serializeForScript } from './lib/serialize';
