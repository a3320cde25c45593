export function EmptyState({ message, hidden }: { message: string; hidden?: boolean }) {
  return (
    <div className="no-results" id="no-results" hidden={hidden}>
      {message}
    </div>
  );
}
