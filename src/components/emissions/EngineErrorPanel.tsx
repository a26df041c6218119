import { EmissionsEngineError, SchemaError } from '../../engine/errors/EmissionsEngineError';

/**
 * Shows a pipeline failure. Schema failures also list the missing roles and
 * the columns that were seen, so the user can rename them.
 */
export default function EngineErrorPanel({ error }: { error: Error }) {
  const title = error instanceof EmissionsEngineError ? 'The dataset cannot be processed' : 'Something went wrong';

  return (
    <div style={{
      padding: '1rem 1.25rem', background: '#fff5f5',
      border: '1px solid #fed7d7', borderRadius: 10, color: '#742a2a',
    }}>
      <h3 style={{ margin: '0 0 0.5rem', color: '#c53030' }}>{title}</h3>
      <p style={{ margin: 0, fontSize: '0.9rem' }}>{error.message}</p>
      {error instanceof SchemaError && (
        <dl style={{ fontSize: '0.8rem', marginTop: '0.75rem' }}>
          <dt style={{ fontWeight: 700 }}>Missing roles</dt>
          <dd style={{ margin: '0 0 0.5rem' }}>{error.missingRoles.join(', ')}</dd>
          <dt style={{ fontWeight: 700 }}>Columns in the file</dt>
          <dd style={{ margin: 0 }}>{error.seenColumns.join(', ') || '(none)'}</dd>
        </dl>
      )}
    </div>
  );
}
