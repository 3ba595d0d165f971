// keep test output free of pipeline logs
process.env.LOG_LEVEL = "silent";
process.env.LOG_PRETTY = "false";
