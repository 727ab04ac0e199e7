interface EmptyStateProps {
  message?: string;
}

export function EmptyState({ message = 'Add one from the side panel or import a file.' }: EmptyStateProps) {
  return (
    <div className="empty-state">
      <p className="empty-state-title">No subscriptions yet</p>
      <p className="no-data">{message}</p>
    </div>
  );
}
