import { SecretsManagerClient, GetSecretValueCommand } from "@aws-sdk/client-secrets-manager";
import { ConfigError } from "../errors";

export function secretReader(client: Pick<SecretsManagerClient, "send"> = new SecretsManagerClient({})) {
    return async (secretId: string): Promise<string> => {
        const out = await client.send(new GetSecretValueCommand({ SecretId: secretId }));
        const value = out.SecretString?.trim();
        if (!value) throw new ConfigError(`Secret ${secretId} has no string value`);
        return value;
    };
}
