import type { EmissionsMetaV1 } from '../../contracts/EmissionsOutputV1';
import { DIMENSION_ROLES, GAS_ROLES } from '../../engine/schema/EmissionsInputV1';
import type { ColumnRoleMap, RoleId } from '../../engine/schema/EmissionsInputV1';
import { unresolvedRoles } from '../../engine/modules/SchemaResolverModule';

const CONFIDENCE_COLORS = { high: '#276749', medium: '#c05621', low: '#c53030' } as const;

/** Resolved column per role plus the run's notices. */
export default function DiagnosticsPanel({ roles, meta }: { roles: ColumnRoleMap; meta: EmissionsMetaV1 }) {
  const listed: RoleId[] = [...DIMENSION_ROLES, ...GAS_ROLES].filter(role => role in roles);
  const missing = unresolvedRoles(roles);

  return (
    <div style={{ display: 'grid', gridTemplateColumns: 'repeat(auto-fit, minmax(280px, 1fr))', gap: 16 }}>
      <div>
        <h4 style={{ margin: '0 0 8px' }}>Column roles</h4>
        <table style={{ borderCollapse: 'collapse', fontSize: '0.8rem' }}>
          <tbody>
            {listed.map(role => {
              const column = roles[role];
              return (
                <tr key={role}>
                  <td style={{ padding: '3px 12px 3px 0', fontWeight: 600 }}>{role}</td>
                  <td style={{ padding: '3px 0', color: column ? '#2d3748' : '#a0aec0' }}>
                    {column ?? 'unresolved'}
                  </td>
                </tr>
              );
            })}
          </tbody>
        </table>
        {missing.dimensions.length > 0 && (
          <p style={{ fontSize: '0.75rem', color: '#718096', margin: '8px 0 0' }}>
            Features without a column: {missing.dimensions.join(', ')}
          </p>
        )}
        {missing.gases.length > 0 && (
          <p style={{ fontSize: '0.75rem', color: '#718096', margin: '4px 0 0' }}>
            Scenario gases not in the data: {missing.gases.join(', ')}
          </p>
        )}
      </div>

      <div>
        <h4 style={{ margin: '0 0 8px' }}>
          Data confidence:{' '}
          <span style={{ color: CONFIDENCE_COLORS[meta.confidence.level] }}>
            {meta.confidence.level.toUpperCase()}
          </span>
        </h4>
        {meta.notices.length === 0 ? (
          <p style={{ fontSize: '0.8rem', color: '#718096' }}>No issues detected.</p>
        ) : (
          <ul style={{ margin: 0, paddingLeft: 18 }}>
            {meta.notices.map(n => (
              <li key={n.id} style={{ fontSize: '0.8rem', marginBottom: 6 }}>
                <strong style={{ color: n.severity === 'warn' ? '#c05621' : '#4a5568' }}>{n.title}.</strong>{' '}
                {n.detail}
                {n.improveBy && <div style={{ color: '#718096' }}>{n.improveBy}</div>}
              </li>
            ))}
          </ul>
        )}
        <p style={{ fontSize: '0.7rem', color: '#a0aec0', marginTop: 12 }}>
          Engine {meta.engineVersion} · {meta.contractVersion}
        </p>
      </div>
    </div>
  );
}
