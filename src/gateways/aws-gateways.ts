import type { AutoAssumeGateways } from "../use-cases/configure-auto-assume.js";
import {
    type AwsClientSettings,
    createIamClient,
    createStsClient,
} from "./aws-clients.js";
import { createIamRoleStore } from "./iam-role-store.js";
import { createStsGateway } from "./sts-gateway.js";

export function createAwsGateways(
    settings: AwsClientSettings,
): AutoAssumeGateways {
    const sts = createStsGateway(createStsClient(settings));
    return {
        identity: sts,
        assumeRole: sts,
        roleStore: createIamRoleStore(createIamClient(settings)),
        identityFor: (credentials) =>
            createStsGateway(createStsClient(settings, credentials)),
    };
}
