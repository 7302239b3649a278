// Bucket space. Allocation tables partition [0, MAX_TRAFFIC_VALUE).
export const MAX_TRAFFIC_VALUE = 10000;
export const MAX_HASH_VALUE = 2 ** 32;
export const HASH_SEED = 1;

// Attribute that, when set to a string, replaces the user id as the bucketing key.
export const BUCKETING_ID_ATTRIBUTE = '$opt_bucketing_id';

export const SUPPORTED_DATAFILE_VERSIONS = ['2', '3', '4'];

export const RUNNING_EXPERIMENT_STATUS = 'Running';

export const CUSTOM_ATTRIBUTE_CONDITION_TYPE = 'custom_attribute';

// Numeric audience matchers refuse values that cannot be compared exactly as doubles.
export const MAX_NUMERIC_CONDITION_VALUE = 2 ** 53;

export const MAX_EVENT_QUEUE_SIZE = 100;
