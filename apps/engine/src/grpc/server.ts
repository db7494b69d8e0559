import * as grpc from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { ReflectionService } from '@grpc/reflection';
import path from 'path';
import { DialogServiceImpl } from './dialog.service';
import { HealthService } from './health.service';

export const PROTO_DIR = path.join(__dirname, '../../../..', 'packages/proto');

const protoOptions: protoLoader.Options = {
    keepCase: true,
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
};

export function loadProtos(dir: string = PROTO_DIR): protoLoader.PackageDefinition {
    return protoLoader.loadSync(
        [path.join(dir, 'health.service.proto'), path.join(dir, 'dialog.service.proto')],
        protoOptions,
    );
}

function serviceDefinition(packageDef: protoLoader.PackageDefinition, name: string): protoLoader.ServiceDefinition {
    const def = packageDef[name];
    if (!def || 'format' in def) {
        throw new Error(`Service ${name} is missing from the proto definitions`);
    }
    return def;
}

export function createGrpcServer(dialogService: DialogServiceImpl, healthService: HealthService): grpc.Server {
    const server = new grpc.Server({
        'grpc.max_receive_message_length': 4 * 1024 * 1024,
        'grpc.max_send_message_length': 4 * 1024 * 1024,
        'grpc.keepalive_time_ms': 30000,
        'grpc.keepalive_timeout_ms': 10000,
        'grpc.keepalive_permit_without_calls': 1,
    });

    const packageDef = loadProtos();

    server.addService(serviceDefinition(packageDef, 'grpc.health.v1.Health'), {
        check: healthService.check.bind(healthService),
        watch: healthService.watch.bind(healthService),
    });

    server.addService(serviceDefinition(packageDef, 'parley.DialogService'), {
        listTemplates: dialogService.listTemplates.bind(dialogService),
        createDialog: dialogService.createDialog.bind(dialogService),
        startDialog: dialogService.startDialog.bind(dialogService),
        resumeDialog: dialogService.resumeDialog.bind(dialogService),
        cancelDialog: dialogService.cancelDialog.bind(dialogService),
        getDialog: dialogService.getDialog.bind(dialogService),
        getDialogGraph: dialogService.getDialogGraph.bind(dialogService),
    });

    // reflection for grpcurl debugging
    new ReflectionService(packageDef).addToServer(server);

    return server;
}

export function startGrpcServer(server: grpc.Server, port: number = 50051): Promise<number> {
    return new Promise((resolve, reject) => {
        server.bindAsync(`0.0.0.0:${port}`, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
            if (err) {
                reject(err);
            } else {
                console.log(`[parley] grpc server listening on port ${boundPort}`);
                resolve(boundPort);
            }
        });
    });
}
