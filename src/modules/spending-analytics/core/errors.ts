/**
 * Selection errors. Both block rendering; neither is a failure of the service.
 */

export interface EmptyYearsError {
  readonly type: 'EmptyYearsError';
  readonly message: string;
}

export interface EmptyCategoriesError {
  readonly type: 'EmptyCategoriesError';
  readonly message: string;
}

export type SelectionError = EmptyYearsError | EmptyCategoriesError;

export const createEmptyYearsError = (): EmptyYearsError => ({
  type: 'EmptyYearsError',
  message: 'Please select at least one fiscal year to view data.',
});

export const createEmptyCategoriesError = (): EmptyCategoriesError => ({
  type: 'EmptyCategoriesError',
  message: 'Please select at least one expenditure category to view data.',
});

export const SELECTION_ERROR_HTTP_STATUS: Record<SelectionError['type'], number> = {
  EmptyYearsError: 400,
  EmptyCategoriesError: 400,
};

export const getHttpStatusForError = (error: SelectionError): number => {
  return SELECTION_ERROR_HTTP_STATUS[error.type];
};
