import { z } from "zod";
import { DISPLAY_TYPES } from "../store/types.js";

export const Id = z.coerce.number().int().positive();

export const parseId = (value: unknown) => Id.parse(value);

const text = z.string().trim().min(1);
const optionalText = z.string().trim().min(1).nullable().default(null);

export const PageQuery = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const ProductQuery = PageQuery.extend({
  categoryId: Id.optional(),
  vendorId: Id.optional(),
  search: text.optional(),
  tags: text.optional(),
  minPrice: z.coerce.number().min(0).optional(),
  maxPrice: z.coerce.number().min(0).optional(),
  sortBy: z.enum(["price_asc", "price_desc", "name_asc", "name_desc"]).optional(),
});

export const CategoryQuery = PageQuery.extend({
  vendorId: Id.optional(),
  parentId: Id.optional(),
});

// JSON or an OAuth2 password-grant form; `username` carries the email there
export const LoginBody = z
  .object({
    email: z.string().optional(),
    username: z.string().optional(),
    password: z.string(),
  })
  .transform((b) => ({ login: b.email ?? b.username ?? "", password: b.password }));

export const RefreshBody = z.object({ refresh_token: z.string().min(1) });

export const LogoutBody = z
  .object({ refresh_token: z.string().min(1).optional() })
  .default({});

const Password = z.string().min(8).max(128);

export const RegisterBody = z.object({
  email: z.string().trim().toLowerCase().email(),
  name: text,
  password: Password,
  phone: optionalText,
  isCompany: z.boolean().default(false),
});

export const UserUpdateBody = z
  .object({
    email: z.string().trim().toLowerCase().email(),
    name: text,
    phone: text.nullable(),
    password: Password,
    isCompany: z.boolean(),
    isActive: z.boolean(),
  })
  .partial()
  .strict();

export const PasswordResetRequestBody = z.object({
  email: z.string().trim().toLowerCase().email(),
});

export const PasswordResetConfirmBody = z.object({
  token: z.string().min(1),
  newPassword: Password,
});

export const VendorBody = z.object({
  name: text,
  email: z.string().trim().email().nullable().default(null),
  phone: optionalText,
  city: optionalText,
  isActive: z.boolean().default(true),
});

export const VendorPatch = VendorBody.partial().strict();

export const CategoryBody = z.object({
  name: text,
  description: optionalText,
  parentId: Id.nullable().default(null),
  vendorId: Id.nullable().default(null),
});

export const CategoryPatch = CategoryBody.partial().strict();

export const ProductBody = z.object({
  name: text,
  description: optionalText,
  listPrice: z.number().min(0),
  vendorId: Id.nullable().default(null),
  isActive: z.boolean().default(true),
  imageUrl: optionalText,
  tags: optionalText,
  barcode: optionalText,
  categoryIds: z.array(Id).default([]),
});

export const ProductPatch = ProductBody.partial().strict();

export const AttributeBody = z.object({
  name: text,
  displayType: z.enum(DISPLAY_TYPES).default("radio"),
  isCustom: z.boolean().default(false),
  sequence: z.number().int().default(0),
});

export const AttributePatch = AttributeBody.partial().strict();

export const AttributeValueBody = z.object({
  name: text,
  sequence: z.number().int().default(0),
  isCustom: z.boolean().default(false),
});

export const AttributeValuePatch = AttributeValueBody.partial().strict();

export const VariantQuery = PageQuery.extend({ productId: Id.optional() });

export const VariantBody = z.object({
  productId: Id,
  sku: text,
  price: z.number().min(0),
  barcode: optionalText,
  priceExtra: z.number().default(0),
  attributeValueIds: z.array(Id).default([]),
});

export const VariantPatch = VariantBody.partial().strict();

export const BasketItemBody = z.object({
  productId: Id,
  quantity: z.number().int().positive().default(1),
});

export const BasketItemPatch = z.object({
  quantity: z.number().int().positive(),
});

export const OrderBody = z.object({
  shippingAddress: text,
  paymentMethod: optionalText,
  lines: z
    .array(z.object({ productId: Id, quantity: z.number().int().positive() }))
    .min(1),
});
