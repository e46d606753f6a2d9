// Keep test runs from appending to the default log file
process.env.LOG_FILE = '';
process.env.LOG_LEVEL = 'info';
