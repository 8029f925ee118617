export * from './FileSubmissionMetadataSource';
export * from './FileResultsWriter';
