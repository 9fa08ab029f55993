import React from 'react';

interface DashboardHeaderProps {
  source?: string;
  onOpenFile?: (file: File) => void;
}

export const DashboardHeader: React.FC<DashboardHeaderProps> = ({ source, onOpenFile }) => {
  return (
    <header className="dash-header">
      <div className="logo-block">
        <h1 className="logo">
          <span aria-hidden="true">📚</span>
          <span className="brand"> Library Statistics Dashboard</span>
        </h1>
        {source && <span className="source-chip" title="Loaded file">{source}</span>}
      </div>
      {onOpenFile && (
        <div className="header-actions" aria-label="Quick actions">
          <label className="themed-small-btn file-picker">
            Open file…
            <input
              type="file"
              accept=".csv,.txt,.xlsx,text/csv,application/vnd.openxmlformats-officedocument.spreadsheetml.sheet"
              className="sr-only"
              onChange={e => {
                const file = e.target.files?.[0];
                if (file) onOpenFile(file);
                e.target.value = '';
              }}
            />
          </label>
        </div>
      )}
    </header>
  );
};
