/** Whether a person or software system sits inside or outside the enterprise being modelled. */
export enum Location {
  Internal = 'Internal',
  External = 'External',
  Unspecified = 'Unspecified',
}
