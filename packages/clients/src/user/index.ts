import type { OpenEnumOf, PagePaginatedResult } from "@cloudkit/shared/api";
import {
  JsonDocumentSchema,
  OptionalTimestampSchema,
  buildPath,
  defineOpenEnum,
  listResult,
  toQueryEntries,
  voidResult,
} from "@cloudkit/shared/api";
import { z } from "zod";
import type {
  ApiResource,
  CallOptions,
  ListDirection,
  ListRequest,
  PageParams,
} from "../http/resource";
import { openEnumInput, parseInput } from "../http/resource";

// ============================================================================
// Enums
// ============================================================================

export const MemberStatus = defineOpenEnum("MemberStatus", {
  Accepted: "accepted",
  Pending: "pending",
  Rejected: "rejected",
});
export type MemberStatusValue = OpenEnumOf<typeof MemberStatus>;

export type MembershipOrder = "id" | "account.name" | "status";

// ============================================================================
// Schemas
// ============================================================================

const UserSchema = z
  .object({
    id: z.string(),
    email: z.string(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
    telephone: z.string().nullish(),
    country: z.string().nullish(),
    zipcode: z.string().nullish(),
    suspended: z.boolean().nullish(),
    two_factor_authentication_enabled: z.boolean().nullish(),
    betas: z.array(z.string()).nullish(),
    organizations: z
      .array(
        z
          .object({
            id: z.string(),
            name: z.string().nullish(),
            status: MemberStatus.schema,
            roles: z.array(z.string()).nullish(),
          })
          .passthrough(),
      )
      .nullish(),
    created_on: OptionalTimestampSchema,
    modified_on: OptionalTimestampSchema,
  })
  .passthrough();

const EditUserInputSchema = z
  .object({
    first_name: z.string().optional(),
    last_name: z.string().optional(),
    country: z.string().optional(),
    telephone: z.string().optional(),
    zipcode: z.string().optional(),
  })
  .refine((input) => Object.values(input).some((value) => value !== undefined), {
    message: "At least one field must be set",
  });

const MembershipSchema = z
  .object({
    id: z.string(),
    status: MemberStatus.schema,
    account: z
      .object({ id: z.string(), name: z.string().nullish() })
      .passthrough(),
    api_access_enabled: z.boolean().nullish(),
    /** Per-product read/write flags, e.g. `{ dns: { read, write } }`. */
    permissions: JsonDocumentSchema.nullish(),
    roles: z.array(z.string()).nullish(),
    policies: z
      .array(
        z
          .object({
            id: z.string().nullish(),
            access: z.string().nullish(),
            permission_groups: z.array(JsonDocumentSchema).nullish(),
            resource_groups: z.array(JsonDocumentSchema).nullish(),
          })
          .passthrough(),
      )
      .nullish(),
  })
  .passthrough();

const UpdateMembershipInputSchema = z.object({
  status: openEnumInput(MemberStatus),
});

const InvitationSchema = z
  .object({
    id: z.string(),
    invited_member_email: z.string().nullish(),
    status: MemberStatus.schema,
    invited_on: OptionalTimestampSchema,
    expires_on: OptionalTimestampSchema,
    organization_name: z.string().nullish(),
    roles: z
      .array(
        z
          .object({ id: z.string(), name: z.string().nullish() })
          .passthrough(),
      )
      .nullish(),
  })
  .passthrough();

const RespondToInvitationInputSchema = z.object({
  status: z.enum(["accepted", "rejected"]),
});

// ============================================================================
// Types
// ============================================================================

export type User = z.infer<typeof UserSchema>;
export type EditUserInput = z.input<typeof EditUserInputSchema>;
export type Membership = z.infer<typeof MembershipSchema>;
export type UpdateMembershipInput = z.input<typeof UpdateMembershipInputSchema>;
export type Invitation = z.infer<typeof InvitationSchema>;
export type InvitationResponse = z.infer<
  typeof RespondToInvitationInputSchema
>["status"];

export interface ListMembershipsFilters extends PageParams {
  status?: MemberStatusValue | undefined;
  accountName?: string | undefined;
  order?: MembershipOrder | undefined;
  direction?: ListDirection | undefined;
}

export interface UserClient {
  getUser: (options?: CallOptions) => Promise<User>;
  editUser: (input: EditUserInput, options?: CallOptions) => Promise<User>;
  listMemberships: (
    filters?: ListMembershipsFilters,
    options?: CallOptions,
  ) => Promise<PagePaginatedResult<Membership>>;
  listAllMemberships: (
    filters?: Omit<ListMembershipsFilters, "page">,
    options?: CallOptions,
  ) => AsyncGenerator<Membership, void, undefined>;
  getMembership: (
    membershipId: string,
    options?: CallOptions,
  ) => Promise<Membership>;
  updateMembership: (
    membershipId: string,
    input: UpdateMembershipInput,
    options?: CallOptions,
  ) => Promise<Membership>;
  deleteMembership: (
    membershipId: string,
    options?: CallOptions,
  ) => Promise<void>;
  listInvitations: (options?: CallOptions) => Promise<Invitation[]>;
  getInvitation: (
    invitationId: string,
    options?: CallOptions,
  ) => Promise<Invitation>;
  respondToInvitation: (
    invitationId: string,
    status: InvitationResponse,
    options?: CallOptions,
  ) => Promise<Invitation>;
}

export interface UserClientOptions {
  resource: ApiResource;
}

// ============================================================================
// Client
// ============================================================================

function membershipsList(
  filters: Omit<ListMembershipsFilters, "page" | "perPage">,
): ListRequest<Membership> {
  return {
    path: "memberships",
    query: toQueryEntries(filters, { naming: "dot" }),
    schema: listResult(MembershipSchema),
  };
}

const membershipPath = (membershipId: string) =>
  buildPath("memberships/{membershipId}", { membershipId });

const invitationPath = (invitationId: string) =>
  buildPath("user/invites/{invitationId}", { invitationId });

export function createUserClient(options: UserClientOptions): UserClient {
  const { resource } = options;

  return {
    getUser: (callOptions) => resource.get("user", UserSchema, callOptions),

    editUser: (input, callOptions) =>
      resource.patch(
        "user",
        parseInput(EditUserInputSchema, input, "input"),
        UserSchema,
        callOptions,
      ),

    listMemberships: (filters = {}, callOptions) => {
      const { page, perPage, ...domain } = filters;
      return resource.getPage(
        membershipsList(domain),
        { page, perPage },
        callOptions,
      );
    },

    listAllMemberships: (filters = {}, callOptions) => {
      const { perPage, ...domain } = filters;
      return resource.paginatePages(
        membershipsList(domain),
        { perPage },
        callOptions,
      );
    },

    getMembership: (membershipId, callOptions) =>
      resource.get(membershipPath(membershipId), MembershipSchema, callOptions),

    updateMembership: (membershipId, input, callOptions) =>
      resource.put(
        membershipPath(membershipId),
        parseInput(UpdateMembershipInputSchema, input, "input"),
        MembershipSchema,
        callOptions,
      ),

    deleteMembership: (membershipId, callOptions) =>
      resource.del(membershipPath(membershipId), voidResult, callOptions),

    listInvitations: (callOptions) =>
      resource.get("user/invites", listResult(InvitationSchema), callOptions),

    getInvitation: (invitationId, callOptions) =>
      resource.get(invitationPath(invitationId), InvitationSchema, callOptions),

    respondToInvitation: (invitationId, status, callOptions) =>
      resource.patch(
        invitationPath(invitationId),
        parseInput(RespondToInvitationInputSchema, { status }, "status"),
        InvitationSchema,
        callOptions,
      ),
  };
}
