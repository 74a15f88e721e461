export type MarkerIssueType = 'empty_marker' | 'duplicate' | 'invalid_pattern';

/**
 * A problem found in a single marker fragment.
 */
export type MarkerIssue = {
    type: MarkerIssueType;
    message: string;
    /** The marker involved */
    marker: string;
    /** Engine error for `invalid_pattern` */
    cause?: string;
};

/**
 * Parallel to the validated marker list - undefined means no issue.
 */
export type MarkerValidationResult = (MarkerIssue | undefined)[];
