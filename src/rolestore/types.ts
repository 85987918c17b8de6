// Role-store entities. Only the fields reconciliation relies on are typed;
// everything else the directory returns is passed through untouched.

export interface Role {
  id: string;
  name?: string;

  /** Direct grant, as opposed to membership inherited through a source rule */
  explicit?: boolean;

  /** Granted through a source or group mapping */
  implicit?: boolean;

  [field: string]: unknown;
}

/**
 * Reference returned when resolving role names to identifiers.
 */
export interface RoleRef {
  id: string;
  name: string;
}

export interface User {
  id: string;
  [field: string]: unknown;
}

export interface Source {
  id: string;
  [field: string]: unknown;
}

export interface CreatedResponse {
  id: string;
}
