import { Component } from 'react';
import type { ReactNode } from 'react';
import EngineErrorPanel from './EngineErrorPanel';

interface Props {
  children: ReactNode;
}

interface State {
  error: Error | null;
}

/**
 * Catches render failures below the dashboard. Engine errors are already
 * handled inside the dashboard, so anything caught here is unexpected; the
 * panel offers a retry that re-renders with the same dataset and scenario.
 */
export default class DashboardErrorBoundary extends Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  render() {
    const { error } = this.state;
    if (error === null) return this.props.children;

    return (
      <div style={{ maxWidth: 720, margin: '2rem auto', padding: '0 1rem' }}>
        <EngineErrorPanel error={error} />
        <p style={{ fontSize: '0.85rem', color: '#4a5568' }}>
          The dashboard could not render this dataset under the selected scenario.
          Retry, or load a different file.
        </p>
        <button
          onClick={() => this.setState({ error: null })}
          style={{ padding: '0.5rem 1rem', background: '#3182ce', color: 'white', border: 'none', borderRadius: 8, cursor: 'pointer' }}
        >
          Retry
        </button>
      </div>
    );
  }
}
