/**
 * Microsoft Graph payloads, decoded once at the API boundary.
 */
import { z } from 'zod';
import type { DriveItem } from '../../types/drive.js';
import type { Permission, Principal } from '../../types/permissions.js';

const IdentitySchema = z.object({
  id: z.string().nullish(),
  displayName: z.string().nullish(),
  email: z.string().nullish(),
});

const IdentitySetSchema = z.object({
  user: IdentitySchema.nullish(),
  siteUser: IdentitySchema.nullish(),
  group: IdentitySchema.nullish(),
});

export const GraphPermissionSchema = z.object({
  id: z.string(),
  roles: z.array(z.string()).default([]),
  grantedTo: IdentitySetSchema.nullish(),
  grantedToV2: IdentitySetSchema.nullish(),
  grantedToIdentities: z.array(IdentitySetSchema).nullish(),
  grantedToIdentitiesV2: z.array(IdentitySetSchema).nullish(),
  link: z
    .object({
      type: z.string().nullish(),
      scope: z.string().nullish(),
      webUrl: z.string().nullish(),
    })
    .nullish(),
  inheritedFrom: z
    .object({
      id: z.string().nullish(),
      path: z.string().nullish(),
    })
    .nullish(),
  expirationDateTime: z.string().nullish(),
});

export type GraphPermission = z.infer<typeof GraphPermissionSchema>;

export const PermissionListSchema = z.object({
  value: z.array(GraphPermissionSchema),
});

export const GraphItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  folder: z.object({ childCount: z.number().optional() }).passthrough().nullish(),
  file: z.object({}).passthrough().nullish(),
  parentReference: z
    .object({
      id: z.string().nullish(),
      path: z.string().nullish(),
    })
    .nullish(),
});

export type GraphItem = z.infer<typeof GraphItemSchema>;

export const ChildListSchema = z.object({
  value: z.array(GraphItemSchema),
  '@odata.nextLink': z.string().optional(),
});

export const GraphErrorSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

type IdentitySet = z.infer<typeof IdentitySetSchema>;

function principalOf(set: IdentitySet | null | undefined): Principal | undefined {
  const identity = set?.user ?? set?.siteUser ?? set?.group;
  if (!identity) return undefined;
  const email = identity.email ?? undefined;
  const displayName = identity.displayName ?? email ?? identity.id ?? '';
  if (!displayName && !email) return undefined;
  return email ? { displayName, email } : { displayName };
}

/**
 * Graph repeats the same principal across grantedTo / grantedToV2 and the
 * identities lists; each principal is kept once.
 */
export function toPermission(raw: GraphPermission): Permission {
  const candidates = [
    raw.grantedToV2 ?? raw.grantedTo,
    ...(raw.grantedToIdentitiesV2 ?? raw.grantedToIdentities ?? []),
  ];
  const principals: Principal[] = [];
  const seen = new Set<string>();
  for (const set of candidates) {
    const principal = principalOf(set);
    if (!principal) continue;
    const key = (principal.email ?? principal.displayName).toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    principals.push(principal);
  }

  const permission: Permission = { id: raw.id, roles: raw.roles, principals };
  if (raw.link?.type) {
    permission.link = {
      type: raw.link.type,
      scope: raw.link.scope ?? undefined,
      webUrl: raw.link.webUrl ?? undefined,
    };
  }
  if (raw.inheritedFrom) {
    permission.inheritedFrom = {
      id: raw.inheritedFrom.id ?? undefined,
      path: raw.inheritedFrom.path ?? undefined,
    };
  }
  if (raw.expirationDateTime) permission.expiresAt = raw.expirationDateTime;
  return permission;
}

export function toDriveItem(raw: GraphItem): DriveItem {
  return {
    id: raw.id,
    name: raw.name,
    isFolder: Boolean(raw.folder),
    isFile: Boolean(raw.file),
    parentId: raw.parentReference?.id ?? undefined,
    parentPath: raw.parentReference?.path ?? undefined,
  };
}
