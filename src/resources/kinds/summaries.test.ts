import type * as k8s from "@kubernetes/client-node";
import { summarizeConfigMap } from "./configmaps";
import { deploymentRolloutStatus, summarizeDeployment } from "./deployments";
import { summarizeEvent } from "./events";
import { summarizeCronJob, summarizeJob } from "./jobs";
import { summarizeNamespace } from "./namespaces";
import { summarizeEndpoints, summarizeIngress } from "./network";
import { summarizeNode } from "./nodes";
import { summarizePod } from "./pods";
import { replicaSetRolloutStatus, summarizeReplicaSet } from "./replicasets";
import { summarizeService } from "./services";
import { summarizeStatefulSet } from "./statefulsets";
import { summarizePersistentVolume, summarizePersistentVolumeClaim, summarizeStorageClass } from "./storage";

const now = new Date("2025-03-10T12:00:00Z");
const created = new Date("2025-03-08T09:30:00Z"); // 2d2h30m before now

describe("resource summaries", () => {
  it("summarizes a pod", () => {
    const pod: k8s.V1Pod = {
      metadata: { name: "web-7d4b9", namespace: "shop", creationTimestamp: new Date("2025-03-10T11:55:00Z") },
      spec: {
        nodeName: "worker-1",
        containers: [{ name: "web" }, { name: "sidecar" }],
      },
      status: {
        phase: "Running",
        podIP: "10.0.0.12",
        containerStatuses: [
          { name: "web", ready: true, restartCount: 2, image: "web:1", imageID: "", },
          { name: "sidecar", ready: false, restartCount: 1, image: "proxy:1", imageID: "" },
        ],
      },
    };

    expect(summarizePod(pod, now)).toEqual({
      name: "web-7d4b9",
      namespace: "shop",
      status: "Running",
      ready: "1/2",
      restarts: 3,
      node: "worker-1",
      podIP: "10.0.0.12",
      age: "5m",
    });
  });

  it("falls back for a pod without status", () => {
    expect(summarizePod({ metadata: { name: "pending" } }, now)).toEqual({
      name: "pending",
      namespace: undefined,
      status: "Unknown",
      ready: "0/0",
      restarts: 0,
      node: undefined,
      podIP: undefined,
      age: "N/A",
    });
  });

  it("summarizes a deployment", () => {
    const deployment: k8s.V1Deployment = {
      metadata: { name: "web", namespace: "shop", creationTimestamp: created },
      spec: {
        replicas: 3,
        selector: { matchLabels: { app: "web" } },
        strategy: { type: "RollingUpdate" },
        template: { spec: { containers: [{ name: "web", image: "web:2.1" }, { name: "proxy", image: "envoy:1.30" }] } },
      },
      status: { readyReplicas: 2, updatedReplicas: 3, availableReplicas: 2 },
    };

    expect(summarizeDeployment(deployment, now)).toEqual({
      name: "web",
      namespace: "shop",
      ready: "2/3",
      upToDate: 3,
      available: 2,
      images: ["web:2.1", "envoy:1.30"],
      strategy: "RollingUpdate",
      age: "2d2h",
    });
  });

  it("summarizes a replica set with its controller", () => {
    const replicaSet: k8s.V1ReplicaSet = {
      metadata: {
        name: "web-7d4b9",
        namespace: "shop",
        creationTimestamp: new Date("2025-03-10T08:45:00Z"),
        ownerReferences: [{ apiVersion: "apps/v1", kind: "Deployment", name: "web", uid: "uid-web", controller: true }],
      },
      spec: { replicas: 3, selector: { matchLabels: { app: "web", tier: "front" } } },
      status: { replicas: 3, readyReplicas: 1 },
    };

    expect(summarizeReplicaSet(replicaSet, now)).toEqual({
      name: "web-7d4b9",
      namespace: "shop",
      desired: 3,
      current: 3,
      ready: 1,
      selector: "app=web,tier=front",
      owner: "Deployment/web",
      age: "3h15m",
    });
  });

  it("summarizes a load balancer service", () => {
    const service: k8s.V1Service = {
      metadata: { name: "web", namespace: "shop", creationTimestamp: created },
      spec: {
        type: "LoadBalancer",
        clusterIP: "10.96.0.10",
        selector: { app: "web" },
        ports: [{ port: 80, nodePort: 30080, protocol: "TCP" }, { port: 53, protocol: "UDP" }],
      },
      status: { loadBalancer: { ingress: [{ ip: "203.0.113.7" }, { hostname: "web.example.test" }] } },
    };

    expect(summarizeService(service, now)).toEqual({
      name: "web",
      namespace: "shop",
      type: "LoadBalancer",
      clusterIP: "10.96.0.10",
      externalIPs: ["203.0.113.7", "web.example.test"],
      ports: ["80:30080/TCP", "53/UDP"],
      selector: "app=web",
      age: "2d2h",
    });
  });

  it("lists config map keys in order", () => {
    const configMap: k8s.V1ConfigMap = {
      metadata: { name: "settings", namespace: "shop" },
      data: { "log.level": "debug", "feature.flags": "a,b" },
      binaryData: { "logo.png": "aGVsbG8=" },
    };

    expect(summarizeConfigMap(configMap, now)).toEqual({
      name: "settings",
      namespace: "shop",
      keys: ["feature.flags", "log.level", "logo.png"],
      age: "N/A",
    });
  });

  it("summarizes a namespace", () => {
    const namespace: k8s.V1Namespace = {
      metadata: { name: "shop", creationTimestamp: created },
      status: { phase: "Terminating" },
    };

    expect(summarizeNamespace(namespace, now)).toEqual({ name: "shop", status: "Terminating", age: "2d2h" });
  });

  it("summarizes a node's readiness and roles", () => {
    const node: k8s.V1Node = {
      metadata: {
        name: "cp-1",
        creationTimestamp: created,
        labels: {
          "node-role.kubernetes.io/control-plane": "",
          "node-role.kubernetes.io/etcd": "",
          "kubernetes.io/os": "linux",
        },
      },
      status: {
        conditions: [
          { type: "MemoryPressure", status: "False" },
          { type: "Ready", status: "True" },
        ],
        addresses: [{ type: "Hostname", address: "cp-1" }, { type: "InternalIP", address: "192.168.1.10" }],
        nodeInfo: {
          kubeletVersion: "v1.30.2",
          architecture: "amd64",
          bootID: "",
          containerRuntimeVersion: "containerd://1.7.0",
          kernelVersion: "6.1.0",
          kubeProxyVersion: "v1.30.2",
          machineID: "",
          operatingSystem: "linux",
          osImage: "Debian GNU/Linux 12",
          systemUUID: "",
        },
      },
    };

    expect(summarizeNode(node, now)).toEqual({
      name: "cp-1",
      status: "Ready",
      roles: ["control-plane", "etcd"],
      version: "v1.30.2",
      internalIP: "192.168.1.10",
      age: "2d2h",
    });
  });

  it("summarizes a stateful set", () => {
    const statefulSet: k8s.V1StatefulSet = {
      metadata: { name: "db", namespace: "shop", creationTimestamp: created },
      spec: {
        replicas: 3,
        serviceName: "db-headless",
        selector: { matchLabels: { app: "db" } },
        template: { spec: { containers: [{ name: "postgres", image: "postgres:16" }] } },
      },
      status: { replicas: 3, readyReplicas: 2 },
    };

    expect(summarizeStatefulSet(statefulSet, now)).toEqual({
      name: "db",
      namespace: "shop",
      ready: "2/3",
      serviceName: "db-headless",
      images: ["postgres:16"],
      age: "2d2h",
    });
  });

  it("summarizes finished and running jobs", () => {
    const finished: k8s.V1Job = {
      metadata: { name: "migrate", namespace: "shop", creationTimestamp: created },
      spec: { completions: 1, template: {} },
      status: { succeeded: 1, conditions: [{ type: "Complete", status: "True" }] },
    };
    const running: k8s.V1Job = {
      metadata: { name: "backfill" },
      spec: { completions: 5, template: {} },
      status: { active: 2, succeeded: 3 },
    };

    expect(summarizeJob(finished, now)).toEqual({
      name: "migrate",
      namespace: "shop",
      status: "Complete",
      completions: "1/1",
      age: "2d2h",
    });
    expect(summarizeJob(running, now)).toEqual(expect.objectContaining({ status: "Running", completions: "3/5" }));
  });

  it("summarizes a cron job with its last run", () => {
    const cronJob: k8s.V1CronJob = {
      metadata: { name: "nightly", namespace: "shop", creationTimestamp: created },
      spec: { schedule: "0 2 * * *", jobTemplate: {} },
      status: { active: [{ kind: "Job", name: "nightly-1" }], lastScheduleTime: new Date("2025-03-10T11:30:00Z") },
    };

    expect(summarizeCronJob(cronJob, now)).toEqual({
      name: "nightly",
      namespace: "shop",
      schedule: "0 2 * * *",
      suspend: false,
      active: 1,
      lastSchedule: "30m",
      age: "2d2h",
    });
  });

  it("summarizes an ingress with TLS", () => {
    const ingress: k8s.V1Ingress = {
      metadata: { name: "web", namespace: "shop", creationTimestamp: created },
      spec: {
        ingressClassName: "nginx",
        rules: [{ host: "shop.example.test" }, {}],
        tls: [{ hosts: ["shop.example.test"] }],
      },
      status: { loadBalancer: { ingress: [{ ip: "203.0.113.8" }] } },
    };

    expect(summarizeIngress(ingress, now)).toEqual({
      name: "web",
      namespace: "shop",
      className: "nginx",
      hosts: ["shop.example.test", "*"],
      addresses: ["203.0.113.8"],
      ports: "80, 443",
      age: "2d2h",
    });
  });

  it("lists endpoint addresses with their ports", () => {
    const endpoints: k8s.V1Endpoints = {
      metadata: { name: "web", namespace: "shop" },
      subsets: [
        { addresses: [{ ip: "10.0.0.12" }, { ip: "10.0.0.13" }], ports: [{ port: 8080 }] },
        { addresses: [{ ip: "10.0.0.20" }] },
      ],
    };

    expect(summarizeEndpoints(endpoints, now)).toEqual({
      name: "web",
      namespace: "shop",
      endpoints: ["10.0.0.12:8080", "10.0.0.13:8080", "10.0.0.20"],
      age: "N/A",
    });
  });

  it("summarizes a bound claim and its volume", () => {
    const claim: k8s.V1PersistentVolumeClaim = {
      metadata: { name: "data-db-0", namespace: "shop", creationTimestamp: created },
      spec: { accessModes: ["ReadWriteOnce"], storageClassName: "standard", volumeName: "pv-123" },
      status: { phase: "Bound", capacity: { storage: "10Gi" } },
    };
    const volume: k8s.V1PersistentVolume = {
      metadata: { name: "pv-123", creationTimestamp: created },
      spec: {
        capacity: { storage: "10Gi" },
        accessModes: ["ReadWriteOnce"],
        persistentVolumeReclaimPolicy: "Retain",
        storageClassName: "standard",
        claimRef: { namespace: "shop", name: "data-db-0" },
      },
      status: { phase: "Bound" },
    };

    expect(summarizePersistentVolumeClaim(claim, now)).toEqual({
      name: "data-db-0",
      namespace: "shop",
      status: "Bound",
      volume: "pv-123",
      capacity: "10Gi",
      accessModes: ["ReadWriteOnce"],
      storageClass: "standard",
      age: "2d2h",
    });
    expect(summarizePersistentVolume(volume, now)).toEqual({
      name: "pv-123",
      capacity: "10Gi",
      accessModes: ["ReadWriteOnce"],
      reclaimPolicy: "Retain",
      status: "Bound",
      claim: "shop/data-db-0",
      storageClass: "standard",
      age: "2d2h",
    });
  });

  it("marks the default storage class", () => {
    const storageClass: k8s.V1StorageClass = {
      metadata: { name: "standard", annotations: { "storageclass.kubernetes.io/is-default-class": "true" } },
      provisioner: "rancher.io/local-path",
      volumeBindingMode: "WaitForFirstConsumer",
    };

    expect(summarizeStorageClass(storageClass, now)).toEqual({
      name: "standard",
      provisioner: "rancher.io/local-path",
      reclaimPolicy: "Delete",
      volumeBindingMode: "WaitForFirstConsumer",
      allowVolumeExpansion: false,
      default: true,
      age: "N/A",
    });
  });

  it("summarizes an event with its involved object", () => {
    const event: k8s.CoreV1Event = {
      metadata: { name: "web-7d4b9-x.17a", namespace: "shop" },
      involvedObject: { kind: "Pod", name: "web-7d4b9-x" },
      type: "Warning",
      reason: "BackOff",
      message: "Back-off restarting failed container",
      count: 4,
      lastTimestamp: new Date("2025-03-10T11:58:00Z"),
    };

    expect(summarizeEvent(event, now)).toEqual({
      name: "web-7d4b9-x.17a",
      namespace: "shop",
      type: "Warning",
      reason: "BackOff",
      object: "Pod/web-7d4b9-x",
      message: "Back-off restarting failed container",
      count: 4,
      lastSeen: "2m",
    });
  });
});

describe("rollout status", () => {
  function deployment(status: k8s.V1DeploymentStatus): k8s.V1Deployment {
    return {
      metadata: { name: "web", namespace: "shop", generation: 2 },
      spec: { replicas: 3, selector: { matchLabels: { app: "web" } }, template: {} },
      status,
    };
  }

  it.each<[k8s.V1DeploymentStatus, string]>([
    [{ observedGeneration: 1, updatedReplicas: 3, availableReplicas: 3 }, 'Waiting for deployment "web" spec update to be observed'],
    [{ observedGeneration: 2, updatedReplicas: 1, replicas: 3 }, 'Waiting for deployment "web" rollout to finish: 1 out of 3 new replicas have been updated'],
    [{ observedGeneration: 2, updatedReplicas: 3, replicas: 4, availableReplicas: 3 }, 'Waiting for deployment "web" rollout to finish: 1 old replicas are pending termination'],
    [{ observedGeneration: 2, updatedReplicas: 3, replicas: 3, availableReplicas: 2 }, 'Waiting for deployment "web" rollout to finish: 2 of 3 updated replicas are available'],
  ])("waits on deployment status %j", (status, message) => {
    expect(deploymentRolloutStatus(deployment(status))).toEqual(expect.objectContaining({ complete: false, message }));
  });

  it("reports a deployment past its progress deadline", () => {
    const stalled = deployment({
      observedGeneration: 2,
      updatedReplicas: 1,
      replicas: 3,
      conditions: [{
        type: "Progressing",
        status: "False",
        reason: "ProgressDeadlineExceeded",
        message: 'ReplicaSet "web-5c9" has timed out progressing.',
        lastUpdateTime: new Date("2025-03-10T11:00:00Z"),
      }],
    });

    expect(deploymentRolloutStatus(stalled)).toEqual({
      name: "web",
      namespace: "shop",
      desired: 3,
      updated: 1,
      ready: 0,
      available: 0,
      complete: false,
      message: 'deployment "web" exceeded its progress deadline',
      conditions: [{
        type: "Progressing",
        status: "False",
        reason: "ProgressDeadlineExceeded",
        message: 'ReplicaSet "web-5c9" has timed out progressing.',
      }],
    });
  });

  it("reports a deployment that rolled out", () => {
    const done = deployment({ observedGeneration: 2, updatedReplicas: 3, replicas: 3, readyReplicas: 3, availableReplicas: 3 });

    expect(deploymentRolloutStatus(done)).toEqual(expect.objectContaining({
      complete: true,
      message: 'deployment "web" successfully rolled out',
    }));
  });

  it("compares a replica set's available replicas with the desired count", () => {
    const replicaSet = (status: k8s.V1ReplicaSetStatus): k8s.V1ReplicaSet => ({
      metadata: { name: "web-7d4b9", namespace: "shop" },
      spec: { replicas: 3, selector: { matchLabels: { app: "web" } } },
      status,
    });

    expect(replicaSetRolloutStatus(replicaSet({ replicas: 3, readyReplicas: 3, availableReplicas: 3 }))).toEqual({
      name: "web-7d4b9",
      namespace: "shop",
      desired: 3,
      ready: 3,
      available: 3,
      complete: true,
      message: 'replicaset "web-7d4b9" has all 3 replicas available',
      conditions: [],
    });
    expect(replicaSetRolloutStatus(replicaSet({ replicas: 3, readyReplicas: 1, availableReplicas: 1 }))).toEqual(
      expect.objectContaining({ complete: false, message: 'Waiting for replicaset "web-7d4b9": 1 of 3 replicas are available' }),
    );
  });
});
