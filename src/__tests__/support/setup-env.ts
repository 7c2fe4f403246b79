// Keep jet-logger quiet while the suites run.
process.env.JET_LOGGER_MODE = 'OFF';
