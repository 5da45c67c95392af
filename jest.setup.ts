// Keep test output readable; individual tests raise the level where they assert on log lines
process.env.THERMOSTAT_LOG_LEVEL = 'silent';
