import type { OpenEnumOf } from "@cloudkit/shared/api";
import {
  OptionalTimestampSchema,
  buildPath,
  defineOpenEnum,
  listResult,
  voidResult,
} from "@cloudkit/shared/api";
import { z } from "zod";
import type { ApiResource, CallOptions } from "../http/resource";
import { openEnumInput, parseInput } from "../http/resource";

// ============================================================================
// Enums
// ============================================================================

export const SubscriptionFrequency = defineOpenEnum("SubscriptionFrequency", {
  Weekly: "weekly",
  Monthly: "monthly",
  Quarterly: "quarterly",
  Yearly: "yearly",
});
export type SubscriptionFrequencyValue = OpenEnumOf<typeof SubscriptionFrequency>;

export const SubscriptionState = defineOpenEnum("SubscriptionState", {
  Trial: "Trial",
  Provisioned: "Provisioned",
  Paid: "Paid",
  AwaitingPayment: "AwaitingPayment",
  Cancelled: "Cancelled",
  Failed: "Failed",
  Expired: "Expired",
});
export type SubscriptionStateValue = OpenEnumOf<typeof SubscriptionState>;

// ============================================================================
// Schemas
// ============================================================================

const SubscriptionSchema = z
  .object({
    id: z.string(),
    state: SubscriptionState.schema,
    price: z.number().nullish(),
    currency: z.string().nullish(),
    frequency: SubscriptionFrequency.schema,
    rate_plan: z
      .object({
        id: z.string(),
        public_name: z.string().nullish(),
        currency: z.string().nullish(),
        scope: z.string().nullish(),
        externally_managed: z.boolean().nullish(),
      })
      .passthrough()
      .nullish(),
    current_period_start: OptionalTimestampSchema,
    current_period_end: OptionalTimestampSchema,
    component_values: z
      .array(
        z
          .object({
            name: z.string(),
            value: z.number().nullish(),
            default: z.number().nullish(),
            price: z.number().nullish(),
          })
          .passthrough(),
      )
      .nullish(),
  })
  .passthrough();

const ZoneRatePlanSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    currency: z.string().nullish(),
    duration: z.number().nullish(),
    frequency: SubscriptionFrequency.schema,
    components: z
      .array(
        z
          .object({
            name: z.string(),
            default: z.number().nullish(),
            unit_price: z.number().nullish(),
          })
          .passthrough(),
      )
      .nullish(),
  })
  .passthrough();

const DeleteUserSubscriptionResultSchema = z
  .object({ subscription_id: z.string() })
  .passthrough();

const ComponentValueInputSchema = z.object({
  name: z.string().min(1),
  value: z.number().nonnegative(),
});

const SubscriptionChangeSchema = z.object({
  rate_plan: z.object({ id: z.string().min(1) }).optional(),
  frequency: openEnumInput(SubscriptionFrequency).optional(),
  component_values: z.array(ComponentValueInputSchema).optional(),
});

const CreateSubscriptionInputSchema = SubscriptionChangeSchema.required({
  rate_plan: true,
});

// ============================================================================
// Types
// ============================================================================

export type Subscription = z.infer<typeof SubscriptionSchema>;
export type ZoneRatePlan = z.infer<typeof ZoneRatePlanSchema>;
export type DeleteUserSubscriptionResult = z.infer<
  typeof DeleteUserSubscriptionResultSchema
>;
export type CreateSubscriptionInput = z.input<
  typeof CreateSubscriptionInputSchema
>;
export type UpdateSubscriptionInput = z.input<typeof SubscriptionChangeSchema>;

export interface SubscriptionsClient {
  listAccountSubscriptions: (
    accountId: string,
    options?: CallOptions,
  ) => Promise<Subscription[]>;
  createAccountSubscription: (
    accountId: string,
    input: CreateSubscriptionInput,
    options?: CallOptions,
  ) => Promise<Subscription>;
  updateAccountSubscription: (
    accountId: string,
    subscriptionId: string,
    input: UpdateSubscriptionInput,
    options?: CallOptions,
  ) => Promise<Subscription>;
  deleteAccountSubscription: (
    accountId: string,
    subscriptionId: string,
    options?: CallOptions,
  ) => Promise<void>;
  listUserSubscriptions: (options?: CallOptions) => Promise<Subscription[]>;
  updateUserSubscription: (
    subscriptionId: string,
    input: UpdateSubscriptionInput,
    options?: CallOptions,
  ) => Promise<Subscription>;
  deleteUserSubscription: (
    subscriptionId: string,
    options?: CallOptions,
  ) => Promise<DeleteUserSubscriptionResult>;
  getZoneSubscription: (
    zoneId: string,
    options?: CallOptions,
  ) => Promise<Subscription>;
  createZoneSubscription: (
    zoneId: string,
    input: CreateSubscriptionInput,
    options?: CallOptions,
  ) => Promise<Subscription>;
  updateZoneSubscription: (
    zoneId: string,
    input: UpdateSubscriptionInput,
    options?: CallOptions,
  ) => Promise<Subscription>;
  listZoneRatePlans: (
    zoneId: string,
    options?: CallOptions,
  ) => Promise<ZoneRatePlan[]>;
}

export interface SubscriptionsClientOptions {
  resource: ApiResource;
}

// ============================================================================
// Client
// ============================================================================

const accountSubscriptionsPath = (accountId: string) =>
  buildPath("accounts/{accountId}/subscriptions", { accountId });

const accountSubscriptionPath = (accountId: string, subscriptionId: string) =>
  buildPath("accounts/{accountId}/subscriptions/{subscriptionId}", {
    accountId,
    subscriptionId,
  });

const userSubscriptionPath = (subscriptionId: string) =>
  buildPath("user/subscriptions/{subscriptionId}", { subscriptionId });

const zoneSubscriptionPath = (zoneId: string) =>
  buildPath("zones/{zoneId}/subscription", { zoneId });

export function createSubscriptionsClient(
  options: SubscriptionsClientOptions,
): SubscriptionsClient {
  const { resource } = options;

  const createBody = (input: CreateSubscriptionInput) =>
    parseInput(CreateSubscriptionInputSchema, input, "input");
  const updateBody = (input: UpdateSubscriptionInput) =>
    parseInput(SubscriptionChangeSchema, input, "input");

  return {
    listAccountSubscriptions: (accountId, callOptions) =>
      resource.get(
        accountSubscriptionsPath(accountId),
        listResult(SubscriptionSchema),
        callOptions,
      ),

    createAccountSubscription: (accountId, input, callOptions) =>
      resource.post(
        accountSubscriptionsPath(accountId),
        createBody(input),
        SubscriptionSchema,
        callOptions,
      ),

    updateAccountSubscription: (accountId, subscriptionId, input, callOptions) =>
      resource.put(
        accountSubscriptionPath(accountId, subscriptionId),
        updateBody(input),
        SubscriptionSchema,
        callOptions,
      ),

    deleteAccountSubscription: (accountId, subscriptionId, callOptions) =>
      resource.del(
        accountSubscriptionPath(accountId, subscriptionId),
        voidResult,
        callOptions,
      ),

    listUserSubscriptions: (callOptions) =>
      resource.get(
        "user/subscriptions",
        listResult(SubscriptionSchema),
        callOptions,
      ),

    updateUserSubscription: (subscriptionId, input, callOptions) =>
      resource.put(
        userSubscriptionPath(subscriptionId),
        updateBody(input),
        SubscriptionSchema,
        callOptions,
      ),

    deleteUserSubscription: (subscriptionId, callOptions) =>
      resource.del(
        userSubscriptionPath(subscriptionId),
        DeleteUserSubscriptionResultSchema,
        callOptions,
      ),

    getZoneSubscription: (zoneId, callOptions) =>
      resource.get(zoneSubscriptionPath(zoneId), SubscriptionSchema, callOptions),

    createZoneSubscription: (zoneId, input, callOptions) =>
      resource.post(
        zoneSubscriptionPath(zoneId),
        createBody(input),
        SubscriptionSchema,
        callOptions,
      ),

    updateZoneSubscription: (zoneId, input, callOptions) =>
      resource.put(
        zoneSubscriptionPath(zoneId),
        updateBody(input),
        SubscriptionSchema,
        callOptions,
      ),

    listZoneRatePlans: (zoneId, callOptions) =>
      resource.get(
        buildPath("zones/{zoneId}/available_rate_plans", { zoneId }),
        listResult(ZoneRatePlanSchema),
        callOptions,
      ),
  };
}
