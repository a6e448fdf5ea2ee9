// Keep test output bounded; the server logs every connection and tick milestone.
if (!process.env.SCHED_LOG_QUIET) {
  process.env.SCHED_LOG_QUIET = "1";
}
