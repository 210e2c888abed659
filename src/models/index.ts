export { Customer, type ICustomer } from './Customer'
export { Shop, type IShop } from './Shop'
export { Receipt, type IReceipt } from './Receipt'
export { Draw, type IDraw } from './Draw'
