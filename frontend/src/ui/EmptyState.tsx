import React from 'react';

interface EmptyStateProps {
  type: 'no-results' | 'no-data';
  onAction?: () => void;
}

const STATES = {
  'no-results': {
    title: 'No Records Match',
    message: 'Your current filters didn\'t match any lending records. Widen the date range or select more values.',
    action: 'Reset Filters',
    icon: '🔍',
  },
  'no-data': {
    title: 'No Lending Records',
    message: 'The loaded file has a header but no rows. Open another file to continue.',
    action: undefined,
    icon: '📭',
  },
} as const;

export const EmptyState: React.FC<EmptyStateProps> = ({ type, onAction }) => {
  const state = STATES[type];

  return (
    <div className="empty-state" role="status" aria-live="polite">
      <div className="empty-state-inner">
        <div className="empty-icon" aria-hidden="true">{state.icon}</div>
        <h2 className="empty-title">{state.title}</h2>
        <p className="empty-message">{state.message}</p>
        {state.action && onAction && (
          <button type="button" className="empty-action" onClick={onAction}>
            {state.action}
          </button>
        )}
      </div>
    </div>
  );
};
