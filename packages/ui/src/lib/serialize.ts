/** JSON safe to place inside a `<script>` element: no `<` can close it early. */
export function serializeForScript(data: unknown): string {
  return JSON.stringify(data).replace(/</g, '\\u003c');
}
