import type { V1PersistentVolume, V1PersistentVolumeClaim, V1StorageClass } from "@kubernetes/client-node";
import { defineResource } from "../kube-resource";
import { getKubeResourceSchema } from "../schema";
import { getAge } from "../format";
import type { ResourceHandler } from "../types";

const DEFAULT_CLASS_ANNOTATION = "storageclass.kubernetes.io/is-default-class";

export type PersistentVolumeClaimSummary = {
  name: string;
  namespace?: string;
  status: string;
  volume?: string;
  capacity?: string;
  accessModes: string[];
  storageClass?: string;
  age: string;
};

export function summarizePersistentVolumeClaim(claim: V1PersistentVolumeClaim, now: Date): PersistentVolumeClaimSummary {
  return {
    name: claim.metadata?.name ?? "N/A",
    namespace: claim.metadata?.namespace,
    status: claim.status?.phase ?? "Unknown",
    volume: claim.spec?.volumeName,
    capacity: claim.status?.capacity?.storage,
    accessModes: claim.spec?.accessModes ?? [],
    storageClass: claim.spec?.storageClassName,
    age: getAge(claim.metadata?.creationTimestamp, now),
  };
}

export type PersistentVolumeSummary = {
  name: string;
  capacity?: string;
  accessModes: string[];
  reclaimPolicy?: string;
  status: string;
  claim?: string;
  storageClass?: string;
  age: string;
};

export function summarizePersistentVolume(volume: V1PersistentVolume, now: Date): PersistentVolumeSummary {
  const claim = volume.spec?.claimRef;
  return {
    name: volume.metadata?.name ?? "N/A",
    capacity: volume.spec?.capacity?.storage,
    accessModes: volume.spec?.accessModes ?? [],
    reclaimPolicy: volume.spec?.persistentVolumeReclaimPolicy,
    status: volume.status?.phase ?? "Unknown",
    claim: claim ? `${claim.namespace ?? ""}/${claim.name ?? ""}` : undefined,
    storageClass: volume.spec?.storageClassName,
    age: getAge(volume.metadata?.creationTimestamp, now),
  };
}

export type StorageClassSummary = {
  name: string;
  provisioner: string;
  reclaimPolicy: string;
  volumeBindingMode: string;
  allowVolumeExpansion: boolean;
  default: boolean;
  age: string;
};

export function summarizeStorageClass(storageClass: V1StorageClass, now: Date): StorageClassSummary {
  return {
    name: storageClass.metadata?.name ?? "N/A",
    provisioner: storageClass.provisioner,
    reclaimPolicy: storageClass.reclaimPolicy ?? "Delete",
    volumeBindingMode: storageClass.volumeBindingMode ?? "Immediate",
    allowVolumeExpansion: storageClass.allowVolumeExpansion ?? false,
    default: storageClass.metadata?.annotations?.[DEFAULT_CLASS_ANNOTATION] === "true",
    age: getAge(storageClass.metadata?.creationTimestamp, now),
  };
}

export const persistentVolumeClaimHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("persistentvolumeclaims"),
  verbs: ["list", "get"],
  summarize: summarizePersistentVolumeClaim,
});

export const persistentVolumeHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("persistentvolumes"),
  verbs: ["list", "get"],
  summarize: summarizePersistentVolume,
});

export const storageClassHandler: ResourceHandler = defineResource({
  schema: getKubeResourceSchema("storageclasses"),
  verbs: ["list", "get"],
  summarize: summarizeStorageClass,
});
