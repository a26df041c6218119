import type { GasRole, RoleId } from '../schema/EmissionsInputV1';

export type EngineErrorCode =
  | 'schema.missing_roles'
  | 'scenario.missing_coefficient'
  | 'scenario.not_found'
  | 'dataset.parse_failed'
  | 'dataset.empty';

/** Base class for every condition the engine reports to its caller. */
export class EmissionsEngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A required role could not be matched to any column. */
export class SchemaError extends EmissionsEngineError {
  readonly missingRoles: RoleId[];
  readonly seenColumns: string[];

  constructor(missingRoles: RoleId[], seenColumns: string[]) {
    super(
      'schema.missing_roles',
      `Required column role(s) not found: ${missingRoles.join(', ')}. ` +
      `Columns seen: ${seenColumns.length > 0 ? seenColumns.join(', ') : '(none)'}.`,
    );
    this.missingRoles = missingRoles;
    this.seenColumns = seenColumns;
  }
}

/** The active scenario has no coefficient for a gas that is present in the data. */
export class CoefficientError extends EmissionsEngineError {
  readonly gas: GasRole;
  readonly scenarioId: string;

  constructor(gas: GasRole, scenarioId: string) {
    super(
      'scenario.missing_coefficient',
      `Scenario "${scenarioId}" has no GWP coefficient for ${gas}, which is present in the data.`,
    );
    this.gas = gas;
    this.scenarioId = scenarioId;
  }
}

export class ScenarioNotFoundError extends EmissionsEngineError {
  readonly scenarioId: string;

  constructor(scenarioId: string, knownIds: string[]) {
    super(
      'scenario.not_found',
      `Unknown GWP scenario "${scenarioId}". Known scenarios: ${knownIds.join(', ')}.`,
    );
    this.scenarioId = scenarioId;
  }
}

export class DatasetError extends EmissionsEngineError {
  /** 1-based data row the parser stopped at, when known. */
  readonly row?: number;

  constructor(code: 'dataset.parse_failed' | 'dataset.empty', message: string, row?: number) {
    super(code, message);
    this.row = row;
  }
}
