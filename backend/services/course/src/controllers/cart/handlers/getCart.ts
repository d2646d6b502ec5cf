// backend/services/course/src/controllers/cart/handlers/getCart.ts
import { defineRoute } from "@shared/http/route";
import { zCart, type Cart } from "../../../contracts/cart.contract";

// Internal bookkeeping never leaves the service; zCart strips it.
type StoredCart = Cart & { cartId: string; ownerNote: string };

const CURRENT_CART: StoredCart = {
  cartId: "cart-0001",
  ownerNote: "demo cart",
  items: ["shampoo", "chocolates", "soap"],
  totalPrice: 1500,
  promotionsAttached: false,
};

export const getCart = defineRoute({
  method: "GET",
  path: "/current_cart",
  summary: "Current cart",
  response: zCart,
  handler: () => CURRENT_CART,
});
