// Filtering itself happens client-side in SEARCH_SCRIPT, keyed on the ids below.
export function SearchBar() {
  return (
    <div className="search-container">
      <input
        type="text"
        id="search"
        className="search-box"
        placeholder="Search emails by subject, sender, or content..."
        autoComplete="off"
      />
    </div>
  );
}
