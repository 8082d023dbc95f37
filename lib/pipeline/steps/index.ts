/**
 * Re-export all pipeline steps.
 */

export {DeclareTablesStep} from './declare-tables';
export {ApplyOperationsStep} from './apply-operations';
export {ExportDatabaseStep} from './export-database';
