import React from 'react';
import { logger } from '../logger';

interface ErrorBoundaryState { hasError: boolean; error?: Error; }

export class ErrorBoundary extends React.Component<React.PropsWithChildren, ErrorBoundaryState> {
  state: ErrorBoundaryState = { hasError: false };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { hasError: true, error };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo) {
    logger.error('ui_error', { message: error.message, stack: error.stack?.slice(0, 400), componentStack: info.componentStack?.slice(0, 400) });
  }

  reset = () => this.setState({ hasError: false, error: undefined });

  render() {
    if (this.state.hasError) {
      return (
        <div className="themed-modal-content" role="alert">
          <h1 className="error-title">Something went wrong</h1>
          <p className="error-message">
            An unexpected error occurred while drawing the dashboard. Try <span className="kw">Reset View</span>. If the issue persists, <span className="kw">Reload Page</span>.
          </p>
          {this.state.error && (
            <pre className="error-detail">{this.state.error.message}</pre>
          )}
          <div className="error-actions">
            <button type="button" onClick={this.reset} className="themed-small-btn"><span className="kw">Reset View</span></button>
            <button type="button" onClick={() => window.location.reload()} className="themed-small-btn secondary"><span className="kw">Reload Page</span></button>
          </div>
        </div>
      );
    }
    return this.props.children;
  }
}
