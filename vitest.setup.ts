import { configureLogging } from "@setu/core";

// Keep test output clean; tests that assert on logs pass their own transport.
configureLogging({ transports: [] });
