export type Page = { skip?: number; limit?: number };

export type UserRecord = {
  id: number;
  email: string;
  name: string;
  hashedPassword: string;
  phone: string | null;
  isActive: boolean;
  isSuperuser: boolean;
  isCompany: boolean;
};

export type PublicUser = Omit<UserRecord, "hashedPassword">;

export type NewUser = Omit<UserRecord, "id">;

export type UserPatch = Partial<
  Pick<
    UserRecord,
    "email" | "name" | "phone" | "isActive" | "isCompany" | "hashedPassword"
  >
>;

export type Vendor = {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  city: string | null;
  isActive: boolean;
};

export type NewVendor = Omit<Vendor, "id">;

export type Category = {
  id: number;
  name: string;
  description: string | null;
  parentId: number | null;
  vendorId: number | null;
};

export type NewCategory = Omit<Category, "id">;

export type CategoryFilter = Page & {
  vendorId?: number;
  parentId?: number;
};

export type Product = {
  id: number;
  name: string;
  description: string | null;
  listPrice: number;
  vendorId: number | null;
  isActive: boolean;
  imageUrl: string | null;
  tags: string | null;
  barcode: string | null;
  categoryIds: number[];
};

export type NewProduct = Omit<Product, "id">;

export type ProductSort = "price_asc" | "price_desc" | "name_asc" | "name_desc";

export type ProductFilter = Page & {
  categoryId?: number;
  vendorId?: number;
  search?: string;
  tags?: string;
  minPrice?: number;
  maxPrice?: number;
  sortBy?: ProductSort;
};

export const DISPLAY_TYPES = ["radio", "pills", "select", "color"] as const;

export type DisplayType = (typeof DISPLAY_TYPES)[number];

export type Attribute = {
  id: number;
  name: string;
  displayType: DisplayType;
  isCustom: boolean;
  sequence: number;
};

export type NewAttribute = Omit<Attribute, "id">;

export type AttributeValue = {
  id: number;
  attributeId: number;
  name: string;
  sequence: number;
  isCustom: boolean;
};

export type NewAttributeValue = Omit<AttributeValue, "id" | "attributeId">;

/** A sellable combination of a product's attribute values. */
export type Variant = {
  id: number;
  productId: number;
  sku: string;
  price: number;
  barcode: string | null;
  priceExtra: number;
  attributeValueIds: number[];
};

export type NewVariant = Omit<Variant, "id">;

export type VariantFilter = Page & { productId?: number };

export type BasketItem = {
  id: number;
  basketId: number;
  productId: number;
  quantity: number;
  priceUnit: number;
};

export type Basket = {
  id: number;
  ownerId: string;
  totalPrice: number;
  updatedAt: string;
  items: BasketItem[];
};

export const ORDER_STATES = [
  "draft",
  "pending",
  "confirmed",
  "processing",
  "shipped",
  "delivered",
  "cancelled",
] as const;

export type OrderState = (typeof ORDER_STATES)[number];

export type OrderLine = {
  id: number;
  orderId: number;
  productId: number;
  quantity: number;
  priceUnit: number;
  subtotal: number;
};

export type Order = {
  id: number;
  name: string;
  ownerId: string;
  state: OrderState;
  orderDate: string;
  totalPrice: number;
  shippingAddress: string;
  paymentMethod: string | null;
  lines: OrderLine[];
};

export type OrderInput = {
  shippingAddress: string;
  paymentMethod: string | null;
  lines: { productId: number; quantity: number; priceUnit: number }[];
};

export interface UserRepository {
  findById(id: number): Promise<UserRecord | null>;
  findByEmail(email: string): Promise<UserRecord | null>;
  list(page: Page): Promise<UserRecord[]>;
  create(input: NewUser): Promise<UserRecord>;
  update(id: number, patch: UserPatch): Promise<UserRecord | null>;
  delete(id: number): Promise<boolean>;
}

export interface VendorRepository {
  findById(id: number): Promise<Vendor | null>;
  list(page: Page): Promise<Vendor[]>;
  create(input: NewVendor): Promise<Vendor>;
  update(id: number, patch: Partial<NewVendor>): Promise<Vendor | null>;
  delete(id: number): Promise<boolean>;
}

export interface CategoryRepository {
  findById(id: number): Promise<Category | null>;
  list(filter: CategoryFilter): Promise<Category[]>;
  create(input: NewCategory): Promise<Category>;
  update(id: number, patch: Partial<NewCategory>): Promise<Category | null>;
  delete(id: number): Promise<boolean>;
}

export interface ProductRepository {
  findById(id: number): Promise<Product | null>;
  list(filter: ProductFilter): Promise<Product[]>;
  create(input: NewProduct): Promise<Product>;
  update(id: number, patch: Partial<NewProduct>): Promise<Product | null>;
  delete(id: number): Promise<boolean>;
}

export interface AttributeRepository {
  findById(id: number): Promise<Attribute | null>;
  list(page: Page): Promise<Attribute[]>;
  create(input: NewAttribute): Promise<Attribute>;
  update(id: number, patch: Partial<NewAttribute>): Promise<Attribute | null>;
  delete(id: number): Promise<boolean>;
  listValues(attributeId: number, page: Page): Promise<AttributeValue[]>;
  /** Any attribute's value, by id alone. */
  findValueById(valueId: number): Promise<AttributeValue | null>;
  createValue(
    attributeId: number,
    input: NewAttributeValue,
  ): Promise<AttributeValue>;
  /** Scoped to `attributeId`; a value of another attribute is not found. */
  updateValue(
    attributeId: number,
    valueId: number,
    patch: Partial<NewAttributeValue>,
  ): Promise<AttributeValue | null>;
  deleteValue(attributeId: number, valueId: number): Promise<boolean>;
}

export interface VariantRepository {
  findById(id: number): Promise<Variant | null>;
  list(filter: VariantFilter): Promise<Variant[]>;
  create(input: NewVariant): Promise<Variant>;
  update(id: number, patch: Partial<NewVariant>): Promise<Variant | null>;
  delete(id: number): Promise<boolean>;
}

export interface BasketRepository {
  findByOwner(ownerId: string): Promise<Basket | null>;
  getOrCreate(ownerId: string): Promise<Basket>;
  addItem(
    ownerId: string,
    item: { productId: number; quantity: number; priceUnit: number },
  ): Promise<Basket>;
  updateItem(
    ownerId: string,
    itemId: number,
    quantity: number,
  ): Promise<Basket | null>;
  removeItem(ownerId: string, itemId: number): Promise<Basket | null>;
  clear(ownerId: string): Promise<void>;
}

export interface OrderRepository {
  listByOwner(ownerId: string, page: Page): Promise<Order[]>;
  findForOwner(id: number, ownerId: string): Promise<Order | null>;
  create(ownerId: string, input: OrderInput): Promise<Order>;
  /** Replaces address, payment method and lines; only while in `draft`. */
  replace(
    id: number,
    ownerId: string,
    input: OrderInput,
  ): Promise<Order | null>;
  /** Moves the order to `to` when its current state is one of `from`. */
  transition(
    id: number,
    ownerId: string,
    from: OrderState[],
    to: OrderState,
  ): Promise<Order | null>;
}

export interface Store {
  users: UserRepository;
  vendors: VendorRepository;
  categories: CategoryRepository;
  products: ProductRepository;
  attributes: AttributeRepository;
  variants: VariantRepository;
  baskets: BasketRepository;
  orders: OrderRepository;
  close(): void;
}

export function toPublicUser(user: UserRecord): PublicUser {
  const { hashedPassword: _omit, ...rest } = user;
  return rest;
}
