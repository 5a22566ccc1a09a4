import * as grpc from "@grpc/grpc-js";
import * as protoLoader from "@grpc/proto-loader";
import { ReflectionService } from "@grpc/reflection";
import { HealthService } from "./health.service";
import { WorkflowServiceImpl } from "./workflow.service";

const HEALTH_PROTO_PATH = require.resolve("@canvasflow/proto/health.service.proto");
const WORKFLOW_PROTO_PATH = require.resolve("@canvasflow/proto/workflow.service.proto");

const protoOptions: protoLoader.Options = {
  keepCase: true,
  longs: String,
  enums: String,
  defaults: true,
  oneofs: true,
};

const healthPackageDef = protoLoader.loadSync(HEALTH_PROTO_PATH, protoOptions);
const workflowPackageDef = protoLoader.loadSync(WORKFLOW_PROTO_PATH, protoOptions);

function serviceAt(
  packageDef: protoLoader.PackageDefinition,
  name: string,
): protoLoader.ServiceDefinition {
  const definition = packageDef[name];
  if (!definition || "format" in definition) {
    throw new Error(`${name} is not a service in the loaded protos`);
  }
  return definition;
}

export const healthServiceDefinition = serviceAt(healthPackageDef, "grpc.health.v1.Health");
export const workflowServiceDefinition = serviceAt(workflowPackageDef, "canvasflow.WorkflowService");

export function createGrpcServer(
  health: HealthService,
  workflows: WorkflowServiceImpl,
): grpc.Server {
  const server = new grpc.Server({
    "grpc.max_receive_message_length": 4 * 1024 * 1024,
    "grpc.max_send_message_length": 4 * 1024 * 1024,
    "grpc.keepalive_time_ms": 30000,
    "grpc.keepalive_timeout_ms": 10000,
    "grpc.keepalive_permit_without_calls": 1,
  });

  server.addService(healthServiceDefinition, {
    check: health.check.bind(health),
    watch: health.watch.bind(health),
  });

  server.addService(workflowServiceDefinition, {
    submitWorkflow: workflows.submitWorkflow.bind(workflows),
    getWorkflowStatus: workflows.getWorkflowStatus.bind(workflows),
    streamWorkflow: workflows.streamWorkflow.bind(workflows),
    cancelWorkflow: workflows.cancelWorkflow.bind(workflows),
    deliverWebhook: workflows.deliverWebhook.bind(workflows),
  });

  // reflection for grpcurl debugging
  const reflectionService = new ReflectionService({
    ...healthPackageDef,
    ...workflowPackageDef,
  });
  reflectionService.addToServer(server);

  return server;
}

export function startGrpcServer(
  server: grpc.Server,
  port: number = 50051,
): Promise<number> {
  return new Promise((resolve, reject) => {
    server.bindAsync(
      `0.0.0.0:${port}`,
      grpc.ServerCredentials.createInsecure(),
      (err, boundPort) => {
        if (err) {
          reject(err);
        } else {
          console.log(`[canvasflow] grpc server listening on port ${boundPort}`);
          resolve(boundPort);
        }
      },
    );
  });
}

export function stopGrpcServer(server: grpc.Server): Promise<void> {
  return new Promise((resolve) => {
    server.tryShutdown((err) => {
      if (err) {
        console.error("[grpc] graceful shutdown failed, forcing:", err);
        server.forceShutdown();
      }
      resolve();
    });
  });
}
