export { buildFormPayment } from "./form-payment";
export { buildUrlPayment } from "./url-payment";
export { buildAppPayment, buildAppletPayment } from "./app-payment";
export { buildScanPayment } from "./scan-payment";
export { payByBarcode } from "./barcode-payment";
export { cancelTrade, closeTrade, queryRefund, queryTrade, refundTrade } from "./trade-operations";
export { downloadBill } from "./bill-download";
