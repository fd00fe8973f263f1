// OrderItem Model - snapshot của sản phẩm tại thời điểm đặt hàng

export interface OrderItem {
  product_id: string;
  product_name: string;
  unit_price: number; // minor units
  quantity: number;
  subtotal: number; // unit_price * quantity
}
