/**
 * Metadata presentation types.
 */

/** A choice in a select prompt. */
export interface SelectOption {
  value: string;
  label: string;
  /** Preselected, i.e. the service default */
  selected: boolean;
}
