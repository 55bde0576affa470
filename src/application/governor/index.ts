export * from './GovernorConfig';
export * from './RateGovernor';
export * from './ErrorClassifier';
export * from './SizeCache';
export * from './Batcher';
export * from './StatsCollector';
export * from './DownloadScheduler';
