/**
 * Inline stylesheet and script embedded in every fallback page.
 * Both are static; nothing task-specific is ever interpolated into them.
 */

export const FALLBACK_STYLES = `
    * { box-sizing: border-box; }
    body { font-family: system-ui, -apple-system, "Segoe UI", Roboto, sans-serif; margin: 0; padding: 24px; background: #f4f5f7; color: #1f2933; }
    main { max-width: 1100px; margin: 0 auto; background: #fff; padding: 32px; border-radius: 12px; box-shadow: 0 4px 24px rgba(0, 0, 0, 0.08); }
    h1 { margin-top: 0; }
    section { margin: 24px 0; }
    table { width: 100%; border-collapse: collapse; margin-top: 12px; }
    th, td { border: 1px solid #d9dde3; padding: 8px 10px; text-align: left; }
    thead th { background: #eef0f4; }
    tfoot td { font-weight: 600; background: #fafbfc; }
    input, textarea, select, button { font: inherit; padding: 6px 10px; margin: 4px 0; }
    pre { background: #f7f7f9; padding: 12px; overflow: auto; white-space: pre-wrap; }
    [data-role="status"] { display: block; margin-top: 16px; color: #52606d; min-height: 1.2em; }
    .element { margin: 8px 0; }
`

export const FALLBACK_SCRIPT = `
    document.addEventListener('DOMContentLoaded', function () {
      var status = document.querySelector('[data-role="status"]');
      function report(message) {
        if (status) status.textContent = message;
      }
      document.querySelectorAll('input[data-filter-for]').forEach(function (input) {
        input.addEventListener('input', function () {
          var table = document.getElementById(input.getAttribute('data-filter-for'));
          if (!table) return;
          var needle = input.value.toLowerCase();
          var visible = 0;
          table.querySelectorAll('tbody tr').forEach(function (row) {
            var show = row.textContent.toLowerCase().indexOf(needle) !== -1;
            row.hidden = !show;
            if (show) visible++;
          });
          var count = table.parentElement && table.parentElement.querySelector('[data-role="row-count"]');
          if (count) count.textContent = visible + ' row(s)';
        });
      });
      document.querySelectorAll('button[type="button"]').forEach(function (button) {
        button.addEventListener('click', function () {
          report((button.id || 'button') + ' clicked');
        });
      });
      document.querySelectorAll('form').forEach(function (form) {
        form.addEventListener('submit', function (event) {
          event.preventDefault();
          report((form.id || 'form') + ' submitted');
        });
      });
    });
`
