#!/usr/bin/env node
import { setTimeout as delay } from "node:timers/promises";
import { runMain } from "citty";
import { createAssumeCittyCommand } from "./commands/assume.js";
import { createAwsGateways } from "./gateways/aws-gateways.js";
import { createCredentialsFormatter } from "./use-cases/format-credentials.js";
import { createSettingsParser } from "./use-cases/parse-settings.js";

const main = createAssumeCittyCommand({
    settingsParser: createSettingsParser(),
    formatter: createCredentialsFormatter(),
    gatewaysFor: createAwsGateways,
    sleep: (ms) => delay(ms),
});

runMain(main);
