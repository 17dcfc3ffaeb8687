export { CreateProduct } from "./CreateProduct";
export { GetAllProducts } from "./GetAllProducts";
export { GetProductById } from "./GetProductById";
export { ListProducts, type ListProductsQuery } from "./ListProducts";
export { RemoveProduct } from "./RemoveProduct";
export { UpdateProduct } from "./UpdateProduct";
