import path from 'path';
import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';

export const PROTO_OPTIONS: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

export interface LoadedService {
    definition: protoLoader.PackageDefinition;
    client: grpc.ServiceClientConstructor;
}

export function protoPath(file: string): string {
    return path.join(path.dirname(require.resolve('@ensemble/proto/package.json')), file);
}

function child(node: unknown, key: string): unknown {
    if ((typeof node !== 'object' && typeof node !== 'function') || node === null) return undefined;
    return Reflect.get(node, key);
}

function isServiceClientConstructor(value: unknown): value is grpc.ServiceClientConstructor {
    return typeof value === 'function' && 'service' in value;
}

/**
 * Loads a .proto file from @ensemble/proto and looks up a service by its
 * fully qualified name, e.g. `ensemble.Orchestrator`.
 */
export function loadService(file: string, serviceName: string): LoadedService {
    const definition = protoLoader.loadSync(protoPath(file), PROTO_OPTIONS);
    let node: unknown = grpc.loadPackageDefinition(definition);
    for (const segment of serviceName.split('.')) {
        node = child(node, segment);
    }
    if (!isServiceClientConstructor(node)) {
        throw new Error(`Service "${serviceName}" not found in ${file}`);
    }
    return { definition, client: node };
}
