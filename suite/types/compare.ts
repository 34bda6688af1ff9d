// suite/types/compare.ts

export type ComparisonOptions = {
  /** Every child name on the right side must also exist on the left */
  leftMustHaveAll: boolean;
  /** Every child name on the left side must also exist on the right */
  rightMustHaveAll: boolean;
};

export type MismatchKind =
  | 'missing' // a path does not exist at all
  | 'kind' // directory on one side, something else on the other
  | 'extra' // child present on the right only
  | 'absent' // child present on the left only
  | 'line' // text line differs
  | 'length' // one text file ends before the other
  | 'encoding' // left is text, right is not
  | 'hash' // binary digests differ
  | 'names'; // file-name-only comparison

export type Mismatch = {
  kind: MismatchKind;
  left: string;
  right: string;
  /** Human-readable description naming the offending path/line/item */
  detail: string;
  /** 1-based line number for text mismatches */
  line?: number;
};

export type ComparisonResult = {
  equal: boolean;
  mismatches: Mismatch[];
};

/** How a path is treated at one level of the comparison */
export type PathKind = 'directory' | 'archive' | 'text' | 'binary';

export type NamesCompareOptions = {
  /** Actual side may contain files the expected side does not */
  allowExtra?: boolean;
};
