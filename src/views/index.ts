/**
 * View exports
 */
export { PanelPage, type PanelPageProps } from './PanelPage.js';
export { ErrorPage, type ErrorPageProps } from './ErrorPage.js';
export { recordSummary } from './RecordRow.js';
export {
  emptyRecordFormValues,
  recordFormValuesFromBody,
  recordFormValuesFromRecord,
  type RecordFormState,
  type RecordFormValues,
  type RecordRowState,
} from './forms.js';
