import CryptoJS from 'crypto-js';

/**
 * 登录密码加密：DES / ECB / PKCS#7，8 字节分组，输出 base64。
 * 密钥为平台前端写死的 8 字节常量，由 Credential.cipherKey 传入。
 */
function encryptPassword(password: string, cipherKey: string): string {
  const key = CryptoJS.enc.Utf8.parse(cipherKey);
  const encrypted = CryptoJS.DES.encrypt(CryptoJS.enc.Utf8.parse(password), key, {
    mode: CryptoJS.mode.ECB,
    padding: CryptoJS.pad.Pkcs7,
  });
  return encrypted.ciphertext.toString(CryptoJS.enc.Base64);
}

function decryptPassword(ciphertext: string, cipherKey: string): string {
  const key = CryptoJS.enc.Utf8.parse(cipherKey);
  // 不带 Salted__ 前缀的 base64 会被直接当作密文解析
  const decrypted = CryptoJS.DES.decrypt(ciphertext, key, {
    mode: CryptoJS.mode.ECB,
    padding: CryptoJS.pad.Pkcs7,
  });
  return decrypted.toString(CryptoJS.enc.Utf8);
}

export { decryptPassword, encryptPassword };
