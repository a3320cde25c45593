// Runs in the browser against the markup from ArchiveIndexPage; keep it ES5 and dependency-free.
export const SEARCH_SCRIPT = `(function () {
  var source = document.getElementById('search-index');
  var entries = JSON.parse((source && source.textContent) || '[]');
  var haystacks = {};
  entries.forEach(function (e) {
    haystacks[e.id] = [e.subject, e.from, e.fromName, e.to, e.preview].join('\\n').toLowerCase();
  });

  var items = document.querySelectorAll('#email-list > li');
  var search = document.getElementById('search');
  var noResults = document.getElementById('no-results');
  var filteredCount = document.getElementById('filtered-count');

  function apply(query) {
    var q = query.trim().toLowerCase();
    var shown = 0;
    items.forEach(function (li) {
      var match = !q || (haystacks[li.getAttribute('data-id')] || '').indexOf(q) !== -1;
      li.hidden = !match;
      if (match) shown++;
    });
    filteredCount.textContent = String(shown);
    noResults.hidden = shown !== 0;
  }

  search.addEventListener('input', function () { apply(search.value); });
})();`;
