export {
  type DataRow,
  type DataRecorderOptions,
  type DataRecorder,
  BASE_COLUMNS,
  latitudeColumns,
  sampleRow,
  createDataRecorder,
} from './dataRecorder';
