import type { ArchiveIndexEntry } from '@mailshelf/shared';
import { SEARCH_SCRIPT } from '../lib/search-script';
import { serializeForScript } from '../lib/serialize';
import { INDEX_PAGE_STYLES } from '../styles';
import { AppLayout } from './AppLayout';
import { EmailListItem } from './EmailListItem';
import { EmptyState } from './EmptyState';
import { SearchBar } from './SearchBar';

interface Props {
  entries: ArchiveIndexEntry[];
  title: string;
}

/**
 * Archive landing page. Every entry is rendered up front so the list works
 * without scripts; the embedded index drives the search box.
 */
export function ArchiveIndexPage({ entries, title }: Props) {
  const isEmpty = entries.length === 0;

  return (
    <AppLayout title={title} styles={INDEX_PAGE_STYLES}>
      <div className="header">
        <h1>{title}</h1>
        <div className="stats">
          <span id="total-emails">{entries.length}</span>
          {' emails archived · '}
          <span id="filtered-count">{entries.length}</span>
          {' showing'}
        </div>
      </div>

      <SearchBar />

      <div className="container">
        <ul className="email-list" id="email-list">
          {entries.map((entry) => (
            <EmailListItem key={entry.id} email={entry} />
          ))}
        </ul>
        <EmptyState
          message={isEmpty ? 'No emails in this archive.' : 'No emails found matching your search.'}
          hidden={!isEmpty}
        />
      </div>

      <script type="application/json" id="search-index" dangerouslySetInnerHTML={{ __html: serializeForScript(entries) }} />
      <script dangerouslySetInnerHTML={{ __html: SEARCH_SCRIPT }} />
    </AppLayout>
  );
}
