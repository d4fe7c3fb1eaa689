process.env.STYLEWISE_LOG_LEVEL = process.env.STYLEWISE_LOG_LEVEL ?? 'error';
